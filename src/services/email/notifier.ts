import nodemailer from 'nodemailer';
import { createChildLogger } from '../../lib/logger.js';
import { hasActivity } from '../../workflows/cycle-report.js';
import type { CycleReport, Notifier } from '../../workflows/types.js';
import { formatCycleReport } from './templates.js';

const log = createChildLogger('notifier');

export type NotifyPolicy = 'activity' | 'always';

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

/** The part of a nodemailer transporter the notifier uses. */
export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
}

export function createSmtpTransport(settings: SmtpSettings): MailTransport {
  return nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.secure || settings.port === 465,
    auth: { user: settings.user, pass: settings.pass },
  });
}

export function shouldNotify(report: CycleReport, policy: NotifyPolicy): boolean {
  return policy === 'always' || hasActivity(report);
}

export interface EmailNotifierOptions {
  transport: MailTransport;
  from: string;
  to: string;
  businessName: string;
  notifyOn: NotifyPolicy;
}

/**
 * Emails the operator a summary of each cycle. Delivery errors propagate to
 * the caller, which logs them.
 */
export class EmailNotifier implements Notifier {
  constructor(private readonly options: EmailNotifierOptions) {}

  async notify(report: CycleReport): Promise<void> {
    if (!shouldNotify(report, this.options.notifyOn)) {
      log.debug({ trigger: report.trigger }, 'Quiet cycle, no email sent');
      return;
    }

    const { subject, text } = formatCycleReport(report, this.options.businessName);
    await this.options.transport.sendMail({
      from: this.options.from,
      to: this.options.to,
      subject,
      text,
    });

    log.info({ to: this.options.to, subject }, 'Cycle report emailed');
  }
}

/** Used when no operator address is configured. */
export class LogNotifier implements Notifier {
  async notify(report: CycleReport): Promise<void> {
    log.info(
      {
        trigger: report.trigger,
        status: report.status,
        replied: report.replied,
        failed: report.failed,
        failures: report.failures,
      },
      'Cycle report (email notifications disabled)',
    );
  }
}
