import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { WebClient } from '@slack/web-api';
import { SlackNotifier } from '../notify/slack-notifier.js';
import { createMockLogger } from './helpers.js';
import type { MockLogger } from './helpers.js';

/** Create a mock Slack client */
function makeMockSlackClient() {
  return {
    chat: {
      postMessage: vi.fn().mockResolvedValue({
        ok: true,
        ts: '1234567890.123456',
        channel: 'C0123',
      }),
    },
  };
}

describe('SlackNotifier', () => {
  let mockSlack: ReturnType<typeof makeMockSlackClient>;
  let mock: MockLogger;
  let notifier: SlackNotifier;

  beforeEach(() => {
    mockSlack = makeMockSlackClient();
    const mockLogger = createMockLogger();
    mock = mockLogger.mock;
    notifier = new SlackNotifier(
      {
        recipient: 'C0123',
        token: 'test-token',
        slackClient: mockSlack as unknown as WebClient,
      },
      mockLogger.logger
    );
  });

  it('should post the text to the recipient', async () => {
    await notifier.notify('download complete:\nfile name: build-42.zip');

    expect(mockSlack.chat.postMessage).toHaveBeenCalledWith({
      channel: 'C0123',
      text: 'download complete:\nfile name: build-42.zip',
    });
    expect(mock.error).not.toHaveBeenCalled();
  });

  it('should log and swallow a rejected call', async () => {
    mockSlack.chat.postMessage.mockRejectedValueOnce(new Error('An API error occurred: invalid_auth'));

    await expect(notifier.notify('hello')).resolves.toBeUndefined();

    expect(mock.error).toHaveBeenCalledWith(
      {
        recipient: 'C0123',
        error: 'Failed to send notification: An API error occurred: invalid_auth',
      },
      'Notification failed'
    );
  });

  it('should treat ok=false as a failure', async () => {
    mockSlack.chat.postMessage.mockResolvedValueOnce({ ok: false, error: 'channel_not_found' });

    await notifier.notify('hello');

    expect(mock.error).toHaveBeenCalledWith(
      { recipient: 'C0123', error: 'Failed to send notification: channel_not_found' },
      'Notification failed'
    );
  });

  it('should send each notification independently', async () => {
    mockSlack.chat.postMessage.mockRejectedValueOnce(new Error('ratelimited'));

    await notifier.notify('first');
    await notifier.notify('second');

    expect(mockSlack.chat.postMessage).toHaveBeenCalledTimes(2);
    expect(mockSlack.chat.postMessage).toHaveBeenLastCalledWith({ channel: 'C0123', text: 'second' });
    expect(mock.error).toHaveBeenCalledTimes(1);
  });
});
