import express from 'express';
import { PLANS, PLAN_IDS } from '../config/plans';

const router = express.Router();

router.get('/', (req, res) => {
  const plans = PLAN_IDS.map((id) => {
    const { priceId, ...publicPlan } = PLANS[id];
    return { ...publicPlan, purchasable: Boolean(priceId) };
  });
  res.json({ plans });
});

export default router;
