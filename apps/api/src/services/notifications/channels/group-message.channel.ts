// =====================================================
// Group Message Channel
// =====================================================
// Messaging-app business API (Cloud API shape): one text
// message per call to a pre-provisioned group id. Group
// creation and membership live outside this service.

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ChannelKind } from '@yahrzeit-reminders/shared-types';
import type { RenderedPayload } from '@yahrzeit-reminders/shared-types';
import { logger } from '../../../utils/logger';
import { ChannelPermanentError, ChannelTransientError } from '../../../utils/errors';
import type { ChannelSendResult, NotificationChannel } from './channel.types';

export type GroupMessageHttpClient = Pick<AxiosInstance, 'post'>;

export interface GroupMessageChannelOptions {
  apiBaseUrl: string;
  accessToken: string;
  senderId: string;
  timeoutMs: number;
  client?: GroupMessageHttpClient;
}

const sendResponseSchema = z.object({
  messages: z.array(z.object({ id: z.string() })).min(1),
});

const errorBodySchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.number().optional(),
  }),
});

export class GroupMessageChannel implements NotificationChannel {
  readonly kind = ChannelKind.GROUP_MESSAGE;

  private readonly client: GroupMessageHttpClient;

  constructor(private readonly options: GroupMessageChannelOptions) {
    this.client =
      options.client ??
      axios.create({
        baseURL: options.apiBaseUrl,
        timeout: options.timeoutMs,
        headers: {
          Authorization: `Bearer ${options.accessToken}`,
          'Content-Type': 'application/json',
        },
      });
  }

  async send(address: string, payload: RenderedPayload): Promise<ChannelSendResult> {
    try {
      const response = await this.client.post<unknown>(`/${this.options.senderId}/messages`, {
        messaging_product: 'whatsapp',
        recipient_type: 'group',
        to: address,
        type: 'text',
        text: { body: `*${payload.subject}*\n\n${payload.body}` },
      });

      const parsed = sendResponseSchema.safeParse(response.data);
      return {
        outcome: 'accepted',
        providerMessageId: parsed.success ? (parsed.data.messages[0]?.id ?? null) : null,
      };
    } catch (error) {
      const classified = classifyGroupSendError(error);
      logger.warn('[GroupMessageChannel] Send failed', {
        code: classified.code,
        message: classified.message,
      });
      return classified instanceof ChannelPermanentError
        ? { outcome: 'rejected', reason: classified.message }
        : { outcome: 'transient_error', reason: classified.message };
    }
  }
}

/**
 * 400/404 mean the group id is unknown or the bot was removed;
 * everything else (429, 5xx, auth, timeouts) may clear up.
 */
export function classifyGroupSendError(error: unknown): ChannelPermanentError | ChannelTransientError {
  if (!axios.isAxiosError(error)) {
    return new ChannelTransientError(error instanceof Error ? error.message : String(error));
  }

  const status = error.response?.status;
  if (status === undefined) {
    return new ChannelTransientError(`No response from provider: ${error.code ?? error.message}`);
  }

  const body = errorBodySchema.safeParse(error.response?.data);
  const detail = body.success && body.data.error.message ? body.data.error.message : error.message;

  if (status === 400 || status === 404) {
    return new ChannelPermanentError(`Provider rejected recipient (${status}): ${detail}`);
  }
  return new ChannelTransientError(`Provider error (${status}): ${detail}`);
}
