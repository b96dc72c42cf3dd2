import axios from 'axios';
import { promises as fs } from 'fs';
import path from 'path';
import { config, EmailProvider } from '../config';
import { logger } from '../lib/logger';

export interface MailMessage {
  to: string;
  subject: string;
  html: string;
  text: string;
}

export interface DeliveryResult {
  delivered: boolean;
  channel: EmailProvider;
  location?: string;
}

export interface MailerOptions {
  provider: EmailProvider;
  sender: string;
  sendgridApiKey?: string;
  mailgunApiKey?: string;
  mailgunDomain?: string;
  reportDir: string;
  now?: () => Date;
}

export function mailerOptionsFromConfig(): MailerOptions {
  return {
    provider: config.emailProvider,
    sender: config.senderEmail,
    sendgridApiKey: config.sendgridApiKey,
    mailgunApiKey: config.mailgunApiKey,
    mailgunDomain: config.mailgunDomain,
    reportDir: config.reportDir
  };
}

async function sendViaSendgrid(msg: MailMessage, opts: MailerOptions, apiKey: string): Promise<void> {
  await axios.post(
    'https://api.sendgrid.com/v3/mail/send',
    {
      personalizations: [{ to: [{ email: msg.to }] }],
      from: { email: opts.sender },
      subject: msg.subject,
      content: [
        { type: 'text/plain', value: msg.text },
        { type: 'text/html', value: msg.html }
      ]
    },
    { headers: { Authorization: `Bearer ${apiKey}` }, timeout: 15000 }
  );
}

async function sendViaMailgun(msg: MailMessage, opts: MailerOptions, apiKey: string, domain: string): Promise<void> {
  const form = new URLSearchParams({ from: opts.sender, to: msg.to, subject: msg.subject, text: msg.text, html: msg.html });
  await axios.post(`https://api.mailgun.net/v3/${encodeURIComponent(domain)}/messages`, form, {
    auth: { username: 'api', password: apiKey },
    timeout: 15000
  });
}

/** Writes the text report to reportDir; used when no provider is configured or sending failed. */
export async function saveToFile(msg: MailMessage, opts: MailerOptions): Promise<string> {
  const stamp = (opts.now ? opts.now() : new Date()).toISOString().replace(/[:.]/g, '-');
  await fs.mkdir(opts.reportDir, { recursive: true });
  const file = path.join(opts.reportDir, `digest-${stamp}.txt`);
  await fs.writeFile(file, `To: ${msg.to}\nSubject: ${msg.subject}\n\n${msg.text}`, 'utf8');
  return file;
}

export async function sendMail(msg: MailMessage, opts: MailerOptions = mailerOptionsFromConfig()): Promise<DeliveryResult> {
  const log = logger.child({ provider: opts.provider, to: msg.to });
  try {
    if (opts.provider === 'sendgrid' && opts.sendgridApiKey) {
      await sendViaSendgrid(msg, opts, opts.sendgridApiKey);
      log.info('digest sent');
      return { delivered: true, channel: 'sendgrid' };
    }
    if (opts.provider === 'mailgun' && opts.mailgunApiKey && opts.mailgunDomain) {
      await sendViaMailgun(msg, opts, opts.mailgunApiKey, opts.mailgunDomain);
      log.info('digest sent');
      return { delivered: true, channel: 'mailgun' };
    }
  } catch (err) {
    log.error({ err }, 'email delivery failed, saving report locally');
  }
  const location = await saveToFile(msg, opts);
  log.info({ location }, 'digest saved to file');
  return { delivered: false, channel: 'file', location };
}
