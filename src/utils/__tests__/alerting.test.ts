import { describe, expect, it, vi } from 'vitest';
import { notifyOps } from '../alerting';

describe('notifyOps', () => {
  it('logs the alert when no webhook is configured', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    await notifyOps('Payment webhook could not match order', { eventId: 'evt_1' });

    expect(warn).toHaveBeenCalledWith('[OPS ALERT]', 'Payment webhook could not match order', { eventId: 'evt_1' });
  });

  it('does not throw when the webhook URL is unusable', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(notifyOps('Sweep failed', undefined, 'not a url')).resolves.toBeUndefined();
    expect(error).toHaveBeenCalledWith('Failed to deliver ops alert', expect.any(TypeError));
  });
});
