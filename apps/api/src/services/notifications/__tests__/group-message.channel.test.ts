import { describe, it, expect, vi } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import type { RenderedPayload } from '@yahrzeit-reminders/shared-types';
import { ChannelPermanentError, ChannelTransientError } from '../../../utils/errors';
import { GroupMessageChannel, classifyGroupSendError } from '../channels/group-message.channel';

const payload: RenderedPayload = {
  templateId: 'yahrzeit_reminder',
  locale: 'en',
  subject: 'Yahrzeit reminder: Miriam Levi',
  body: 'Reminder body',
  variables: {},
};

function axiosError(status?: number, data?: unknown): AxiosError {
  const config = { headers: new AxiosHeaders() };
  const response =
    status === undefined ? undefined : { data, status, statusText: 'error', headers: {}, config };
  return new AxiosError(
    'Request failed',
    status === undefined ? 'ECONNABORTED' : 'ERR_BAD_REQUEST',
    config,
    undefined,
    response
  );
}

function createChannel() {
  const post = vi.fn();
  const channel = new GroupMessageChannel({
    apiBaseUrl: 'https://messaging.example.com/v1',
    accessToken: 'test-token',
    senderId: 'sender-1',
    timeoutMs: 1000,
    client: { post },
  });
  return { channel, post };
}

describe('GroupMessageChannel', () => {
  it('posts a text message to the group and returns the message id', async () => {
    const { channel, post } = createChannel();
    post.mockResolvedValue({ data: { messages: [{ id: 'wamid-1' }] } });

    const result = await channel.send('group-123', payload);

    expect(result).toEqual({ outcome: 'accepted', providerMessageId: 'wamid-1' });
    expect(post).toHaveBeenCalledWith('/sender-1/messages', {
      messaging_product: 'whatsapp',
      recipient_type: 'group',
      to: 'group-123',
      type: 'text',
      text: { body: '*Yahrzeit reminder: Miriam Levi*\n\nReminder body' },
    });
  });

  it('accepts a response without a message id', async () => {
    const { channel, post } = createChannel();
    post.mockResolvedValue({ data: {} });

    await expect(channel.send('group-123', payload)).resolves.toEqual({
      outcome: 'accepted',
      providerMessageId: null,
    });
  });

  it('reports an unknown group as rejected', async () => {
    const { channel, post } = createChannel();
    post.mockRejectedValue(axiosError(404, { error: { message: 'Group not found', code: 131026 } }));

    await expect(channel.send('group-404', payload)).resolves.toEqual({
      outcome: 'rejected',
      reason: 'Provider rejected recipient (404): Group not found',
    });
  });

  it('reports throttling as transient', async () => {
    const { channel, post } = createChannel();
    post.mockRejectedValue(axiosError(429));

    await expect(channel.send('group-123', payload)).resolves.toEqual({
      outcome: 'transient_error',
      reason: 'Provider error (429): Request failed',
    });
  });
});

describe('classifyGroupSendError', () => {
  it('treats a missing response as transient', () => {
    const classified = classifyGroupSendError(axiosError());

    expect(classified).toBeInstanceOf(ChannelTransientError);
    expect(classified.message).toBe('No response from provider: ECONNABORTED');
  });

  it('treats a 400 as permanent', () => {
    expect(classifyGroupSendError(axiosError(400))).toBeInstanceOf(ChannelPermanentError);
  });

  it('treats non-axios errors as transient', () => {
    const classified = classifyGroupSendError(new Error('boom'));

    expect(classified).toBeInstanceOf(ChannelTransientError);
    expect(classified.message).toBe('boom');
  });
});
