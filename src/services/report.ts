import { AnalysisResult } from '../types/analysis';
import { trendTable } from '../config/trends';
import { TrendRecommendation, trendRecommendations } from './trends';

export interface DigestReport {
  owner: string;
  generatedAt: Date;
  analyzed: AnalysisResult[]; // ranked, best first
  revenueOpportunities: string[];
  nextSteps: string[];
  trends: TrendRecommendation[]; // for the leader only
  issues: string[];
  totalEstimatedValue: number;
  activeProjects: number;
  highPriority: number;
  deploymentStatus: string;
}

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

const ACTIVE_THRESHOLD = 40;
const DEPLOY_READY_THRESHOLD = 70;

export function formatDate(d: Date): string {
  return `${MONTHS[d.getUTCMonth()]} ${d.getUTCDate()}, ${d.getUTCFullYear()}`;
}

export function formatUsd(n: number): string {
  return `$${String(Math.round(n)).replace(/\B(?=(\d{3})+(?!\d))/g, ',')}`;
}

export function escapeHtml(v: string): string {
  return v
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function byRepository(a: AnalysisResult, b: AnalysisResult): number {
  if (a.repository < b.repository) return -1;
  return a.repository > b.repository ? 1 : 0;
}

/** Best first; equal scores fall back to repository name, compared by code unit so runs are stable. */
export function rankResults(results: readonly AnalysisResult[]): AnalysisResult[] {
  return [...results].sort((a, b) => b.total_score - a.total_score || byRepository(a, b));
}

export function buildDigestReport(owner: string, results: readonly AnalysisResult[], issues: string[], generatedAt: Date): DigestReport {
  const analyzed = rankResults(results);
  const leader = analyzed[0];
  const deployReady = analyzed.filter((r) => r.scores.deployment_ready > DEPLOY_READY_THRESHOLD).length;

  return {
    owner,
    generatedAt,
    analyzed,
    revenueOpportunities: leader ? leader.monetization_strategies.slice(0, 3) : [],
    nextSteps: leader
      ? [
          ...leader.next_steps.slice(0, 3),
          `Implement top priority improvements for ${leader.repository}`,
          'Continue with next highest-priority repository'
        ]
      : ['Complete repository analysis'],
    trends: leader ? trendRecommendations(leader).slice(0, trendTable.shownPerDigest) : [],
    issues,
    totalEstimatedValue: analyzed.reduce((sum, r) => sum + r.estimated_value, 0),
    activeProjects: analyzed.filter((r) => r.total_score > ACTIVE_THRESHOLD).length,
    highPriority: analyzed.filter((r) => r.revenue_potential === 'High' || r.revenue_potential === 'Very High').length,
    deploymentStatus: `${deployReady}/${analyzed.length} ready`
  };
}

export function digestSubject(report: DigestReport): string {
  return `Daily Repository Revenue Report - ${formatDate(report.generatedAt)}`;
}

function listItems(items: readonly string[], empty: string): string {
  if (!items.length) return `<li>${escapeHtml(empty)}</li>`;
  return items.map((i) => `<li>${escapeHtml(i)}</li>`).join('');
}

export function renderDigestHtml(report: DigestReport): string {
  const top = report.analyzed.slice(0, 5).map((r) => {
    const strategy = r.monetization_strategies[0] || 'N/A';
    return (
      `<li><strong>${escapeHtml(r.repository)}</strong>: ${r.total_score}/100 (${escapeHtml(r.revenue_potential)})` +
      `<br><small>Value: ${formatUsd(r.estimated_value)} | Top strategy: ${escapeHtml(strategy)}</small></li>`
    );
  });
  const trends = report.trends.length
    ? `<div class="section"><h2>AI Trend Recommendations</h2><ul>${report.trends
        .map((t) => `<li><strong>[${escapeHtml(t.priority)}]</strong> ${escapeHtml(t.action)}<br><small>Impact: ${escapeHtml(t.impact)}</small></li>`)
        .join('')}</ul></div>`
    : '';
  const issues = report.issues.length
    ? `<div class="section"><h2>Issues</h2><ul>${listItems(report.issues, '')}</ul></div>`
    : '';

  return `<!DOCTYPE html>
<html>
<head>
<style>
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #333; }
  .container { max-width: 800px; margin: 0 auto; padding: 20px; }
  .header { background: #4f46e5; color: white; padding: 24px; border-radius: 10px; margin-bottom: 24px; }
  .section { background: #f8f9fa; padding: 20px; border-radius: 8px; margin-bottom: 20px; }
  .section h2 { margin-top: 0; color: #4f46e5; }
</style>
</head>
<body>
<div class="container">
  <div class="header">
    <h1 style="margin: 0;">Daily Repository Revenue Report</h1>
    <p style="margin: 8px 0 0 0;">${escapeHtml(report.owner)} &middot; ${formatDate(report.generatedAt)}</p>
  </div>
  <div class="section">
    <h2>Summary</h2>
    <ul>
      <li><strong>Repositories analyzed:</strong> ${report.analyzed.length}</li>
      <li><strong>Total revenue potential:</strong> ${formatUsd(report.totalEstimatedValue)}</li>
      <li><strong>Active projects:</strong> ${report.activeProjects}</li>
      <li><strong>High-priority projects:</strong> ${report.highPriority}</li>
      <li><strong>Deployment status:</strong> ${escapeHtml(report.deploymentStatus)}</li>
    </ul>
  </div>
  <div class="section">
    <h2>Top Repositories</h2>
    <ol>${top.length ? top.join('') : '<li>No repositories analyzed</li>'}</ol>
  </div>
  <div class="section">
    <h2>Revenue Opportunities</h2>
    <ul>${listItems(report.revenueOpportunities, 'No new opportunities identified')}</ul>
  </div>
  <div class="section">
    <h2>Next Steps</h2>
    <ul>${listItems(report.nextSteps, 'Planning in progress')}</ul>
  </div>
  ${trends}
  ${issues}
</div>
</body>
</html>`;
}

export function renderDigestText(report: DigestReport): string {
  const lines: string[] = [];
  lines.push(`DAILY REPOSITORY REVENUE REPORT - ${formatDate(report.generatedAt)}`);
  lines.push(`Owner: ${report.owner}`);
  lines.push('');
  lines.push('SUMMARY');
  lines.push(`  Repositories analyzed: ${report.analyzed.length}`);
  lines.push(`  Total revenue potential: ${formatUsd(report.totalEstimatedValue)}`);
  lines.push(`  Active projects: ${report.activeProjects}`);
  lines.push(`  High-priority projects: ${report.highPriority}`);
  lines.push(`  Deployment status: ${report.deploymentStatus}`);
  lines.push('');
  lines.push('TOP REPOSITORIES');
  if (!report.analyzed.length) lines.push('  No repositories analyzed');
  report.analyzed.slice(0, 5).forEach((r, i) => {
    lines.push(`  ${i + 1}. ${r.repository} - ${r.total_score}/100 (${r.revenue_potential}), ${formatUsd(r.estimated_value)}`);
    lines.push(`     Top strategy: ${r.monetization_strategies[0] || 'N/A'}`);
  });
  lines.push('');
  lines.push('REVENUE OPPORTUNITIES');
  for (const o of report.revenueOpportunities) lines.push(`  - ${o}`);
  if (!report.revenueOpportunities.length) lines.push('  - No new opportunities identified');
  lines.push('');
  lines.push('NEXT STEPS');
  for (const s of report.nextSteps) lines.push(`  - ${s}`);
  if (report.trends.length) {
    lines.push('');
    lines.push('AI TREND RECOMMENDATIONS');
    for (const t of report.trends) {
      lines.push(`  - [${t.priority}] ${t.action}`);
      lines.push(`    Impact: ${t.impact}`);
    }
  }
  if (report.issues.length) {
    lines.push('');
    lines.push('ISSUES');
    for (const i of report.issues) lines.push(`  - ${i}`);
  }
  return lines.join('\n') + '\n';
}
