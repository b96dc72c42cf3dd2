import axios, { AxiosResponse } from 'axios';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { MailMessage, MailerOptions, sendMail } from '../src/services/mailer';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

const NOW = new Date('2026-10-19T09:00:00.000Z');
const MESSAGE: MailMessage = {
  to: 'owner@example.com',
  subject: 'Daily Repository Revenue Report - October 19, 2026',
  html: '<p>report</p>',
  text: 'report\n'
};

function accepted(status: number): AxiosResponse {
  return { data: {}, status, statusText: 'OK', headers: {}, config: { headers: {} } } as AxiosResponse;
}

describe('sendMail', () => {
  let reportDir: string;

  beforeEach(async () => {
    mockedAxios.post.mockReset();
    reportDir = await fs.mkdtemp(path.join(os.tmpdir(), 'digest-'));
  });

  afterEach(async () => {
    await fs.rm(reportDir, { recursive: true, force: true });
  });

  function options(overrides: Partial<MailerOptions> = {}): MailerOptions {
    return { provider: 'file', sender: 'reports@example.com', reportDir, now: () => NOW, ...overrides };
  }

  it('writes the text report when the file channel is selected', async () => {
    const result = await sendMail(MESSAGE, options());
    const location = path.join(reportDir, 'digest-2026-10-19T09-00-00-000Z.txt');
    expect(result).toEqual({ delivered: false, channel: 'file', location });
    expect(await fs.readFile(location, 'utf8')).toBe(
      'To: owner@example.com\nSubject: Daily Repository Revenue Report - October 19, 2026\n\nreport\n'
    );
    expect(mockedAxios.post).not.toHaveBeenCalled();
  });

  it('sends through SendGrid', async () => {
    mockedAxios.post.mockResolvedValue(accepted(202));
    const result = await sendMail(MESSAGE, options({ provider: 'sendgrid', sendgridApiKey: 'test-sendgrid-key' }));
    expect(result).toEqual({ delivered: true, channel: 'sendgrid' });
    expect(mockedAxios.post).toHaveBeenCalledWith(
      'https://api.sendgrid.com/v3/mail/send',
      {
        personalizations: [{ to: [{ email: 'owner@example.com' }] }],
        from: { email: 'reports@example.com' },
        subject: MESSAGE.subject,
        content: [
          { type: 'text/plain', value: 'report\n' },
          { type: 'text/html', value: '<p>report</p>' }
        ]
      },
      { headers: { Authorization: 'Bearer test-sendgrid-key' }, timeout: 15000 }
    );
  });

  it('sends through Mailgun as a form', async () => {
    mockedAxios.post.mockResolvedValue(accepted(200));
    const result = await sendMail(
      MESSAGE,
      options({ provider: 'mailgun', mailgunApiKey: 'test-mailgun-key', mailgunDomain: 'mg.example.com' })
    );
    expect(result).toEqual({ delivered: true, channel: 'mailgun' });
    const [url, body, config] = mockedAxios.post.mock.calls[0];
    expect(url).toBe('https://api.mailgun.net/v3/mg.example.com/messages');
    expect(body).toBeInstanceOf(URLSearchParams);
    expect(String(body)).toContain('to=owner%40example.com');
    expect(config).toEqual({ auth: { username: 'api', password: 'test-mailgun-key' }, timeout: 15000 });
  });

  it('falls back to a file when the provider fails', async () => {
    mockedAxios.post.mockRejectedValue(new Error('503 Service Unavailable'));
    const result = await sendMail(MESSAGE, options({ provider: 'sendgrid', sendgridApiKey: 'test-sendgrid-key' }));
    expect(result.delivered).toBe(false);
    expect(result.channel).toBe('file');
    expect(result.location).toBe(path.join(reportDir, 'digest-2026-10-19T09-00-00-000Z.txt'));
  });

  it('falls back to a file when credentials are missing', async () => {
    const result = await sendMail(MESSAGE, options({ provider: 'sendgrid' }));
    expect(result.channel).toBe('file');
    expect(mockedAxios.post).not.toHaveBeenCalled();
  });
});
