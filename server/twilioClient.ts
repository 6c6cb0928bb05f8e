/**
 * Twilio Client
 *
 * SMS transport for risk alerts. Credentials come from MonitorConfig; the
 * rest of the core only sees the SmsTransport interface.
 */

import twilio from 'twilio';
import type { TwilioConfig } from './config';
import { errorMessage } from './errors';

export type SmsSendResult =
  | { ok: true; sid: string }
  | { ok: false; error: string };

export interface SmsTransport {
  send(to: string, body: string): Promise<SmsSendResult>;
}

/** Keeps the last four digits so log lines stay traceable. */
export function maskPhoneNumber(phoneNumber: string): string {
  const digits = phoneNumber.replace(/\D/g, '');
  if (digits.length <= 4) return '***';
  return `***${digits.slice(-4)}`;
}

export class TwilioSmsTransport implements SmsTransport {
  private readonly client: ReturnType<typeof twilio>;

  constructor(private readonly config: TwilioConfig) {
    this.client = twilio(config.accountSid, config.authToken);
  }

  async send(to: string, body: string): Promise<SmsSendResult> {
    try {
      const message = await this.client.messages.create({
        body,
        from: this.config.fromNumber,
        to,
      });
      return { ok: true, sid: message.sid };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }
}

/**
 * Stand-in used when Twilio credentials are absent: every send fails, so
 * alerts stay pending and are retried once the transport is configured.
 */
export class UnconfiguredSmsTransport implements SmsTransport {
  private hasWarned = false;

  async send(): Promise<SmsSendResult> {
    if (!this.hasWarned) {
      console.warn('[Twilio] TWILIO_ACCOUNT_SID / TWILIO_AUTH_TOKEN / TWILIO_FROM_NUMBER not set - SMS alerts disabled');
      this.hasWarned = true;
    }
    return { ok: false, error: 'Twilio not configured' };
  }
}

export function createSmsTransport(config: TwilioConfig | null): SmsTransport {
  return config ? new TwilioSmsTransport(config) : new UnconfiguredSmsTransport();
}
