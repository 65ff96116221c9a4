// =====================================================
// Email Channel (Resend)
// =====================================================

import { Resend } from 'resend';
import { ChannelKind } from '@yahrzeit-reminders/shared-types';
import type { RenderedPayload } from '@yahrzeit-reminders/shared-types';
import { logger } from '../../../utils/logger';
import type { ChannelSendResult, NotificationChannel } from './channel.types';

/** The slice of the Resend client this channel calls */
export interface EmailSender {
  send(message: {
    from: string;
    to: string[];
    subject: string;
    text: string;
  }): Promise<{
    data: { id: string } | null;
    error: { name: string; message: string } | null;
  }>;
}

export interface EmailChannelOptions {
  fromAddress: string;
  fromName: string;
}

// Resend error names that will not succeed on retry
const PERMANENT_ERRORS = new Set([
  'validation_error',
  'invalid_parameter',
  'missing_required_field',
  'not_found',
]);

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export class EmailChannel implements NotificationChannel {
  readonly kind = ChannelKind.EMAIL;

  constructor(
    private readonly sender: EmailSender,
    private readonly options: EmailChannelOptions
  ) {}

  static fromApiKey(apiKey: string, options: EmailChannelOptions): EmailChannel {
    return new EmailChannel(new Resend(apiKey).emails, options);
  }

  async send(address: string, payload: RenderedPayload): Promise<ChannelSendResult> {
    if (!EMAIL_PATTERN.test(address)) {
      return { outcome: 'rejected', reason: `Invalid email address "${address}"` };
    }

    try {
      const { data, error } = await this.sender.send({
        from: `${this.options.fromName} <${this.options.fromAddress}>`,
        to: [address],
        subject: payload.subject,
        text: payload.body,
      });

      if (error) {
        logger.warn('[EmailChannel] Provider error', { name: error.name, message: error.message });
        return PERMANENT_ERRORS.has(error.name)
          ? { outcome: 'rejected', reason: `${error.name}: ${error.message}` }
          : { outcome: 'transient_error', reason: `${error.name}: ${error.message}` };
      }

      return { outcome: 'accepted', providerMessageId: data?.id ?? null };
    } catch (error) {
      // Network failures surface as thrown errors from the SDK
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('[EmailChannel] Request failed', { error: message });
      return { outcome: 'transient_error', reason: message };
    }
  }
}
