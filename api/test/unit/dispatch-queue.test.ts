import { describe, it, expect, vi } from 'vitest';
import { DispatchQueue } from '../../src/services/dispatch-queue.service.js';
import { EmailDispatcher } from '../../src/services/email-dispatcher.service.js';
import { MetricsService } from '../../src/services/metrics.service.js';
import { RetryPolicyService } from '../../src/services/retry-policy.service.js';
import type { RelaySendResult } from '../../src/providers/relay-client.interface.js';
import type { OutboundEmail } from '../../src/types/email.types.js';
import { FakeRelay, RecordingObserver, deferred, recordingSleep, silentLogger } from '../helpers/fakes.js';
import type { Deferred } from '../helpers/fakes.js';

function outbound(id: string): OutboundEmail {
  return {
    dispatchId: id,
    from: 'sender@example.com',
    recipients: ['a@b.co'],
    raw: Buffer.from('To: a@b.co\r\nSubject: \r\n\r\n\r\n'),
  };
}

/** Relay whose calls stay pending until the test releases them */
function gatedRelay() {
  const gates: Deferred<RelaySendResult>[] = [];
  const relay = new FakeRelay(() => {
    const gate = deferred<RelaySendResult>();
    gates.push(gate);
    return gate.promise;
  });
  return { relay, gates };
}

function setup(relay: FakeRelay, maxConcurrent = 0) {
  const observer = new RecordingObserver();
  const metrics = new MetricsService();
  const dispatcher = new EmailDispatcher({
    relay,
    retryPolicy: new RetryPolicyService(),
    observer,
    sleep: recordingSleep().sleep,
  });
  const queue = new DispatchQueue(dispatcher, silentLogger(), metrics, { maxConcurrent, idlePollMs: 5 });
  return { queue, observer, metrics, dispatcher };
}

describe('Dispatch Queue', () => {
  it('should return from submit before the relay answers', async () => {
    const { relay, gates } = gatedRelay();
    const { queue, observer } = setup(relay);

    queue.submit(outbound('d-1'));

    expect(queue.isIdle()).toBe(false);
    await vi.waitFor(() => expect(relay.calls).toBe(1));
    expect(observer.delivered).toHaveLength(0);

    gates[0].resolve({ ok: true });
    await queue.waitForIdle();

    expect(observer.delivered).toHaveLength(1);
    expect(queue.getCounts()).toMatchObject({ done: 1, failed: 0 });
  });

  it('should run dispatches one at a time when capped at one', async () => {
    const { relay, gates } = gatedRelay();
    const { queue } = setup(relay, 1);

    queue.submit(outbound('d-1'));
    queue.submit(outbound('d-2'));

    await vi.waitFor(() => expect(relay.calls).toBe(1));
    // The second dispatch must not start while the first is pending
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(relay.calls).toBe(1);

    gates[0].resolve({ ok: true });
    await vi.waitFor(() => expect(relay.calls).toBe(2));
    gates[1].resolve({ ok: true });

    await queue.waitForIdle();
    expect(queue.getCounts()).toEqual({ queued: 0, running: 0, done: 2, failed: 0 });
  });

  it('should run dispatches concurrently when uncapped', async () => {
    const { relay, gates } = gatedRelay();
    const { queue } = setup(relay);

    queue.submit(outbound('d-1'));
    queue.submit(outbound('d-2'));
    queue.submit(outbound('d-3'));

    await vi.waitFor(() => expect(relay.calls).toBe(3));
    gates.forEach((gate) => gate.resolve({ ok: true }));

    await queue.waitForIdle();
    expect(queue.getCounts().done).toBe(3);
  });

  it('should count a dispatch that crashes as failed and keep going', async () => {
    const { relay } = gatedRelay();
    const { queue, dispatcher } = setup(relay);
    vi.spyOn(dispatcher, 'dispatch').mockRejectedValueOnce(new Error('observer blew up'));

    queue.submit(outbound('d-1'));
    await queue.waitForIdle();

    expect(queue.getCounts()).toMatchObject({ done: 0, failed: 1 });
    expect(queue.isIdle()).toBe(true);
  });

  it('should report the in-flight count on the queue size gauge', async () => {
    const { relay, gates } = gatedRelay();
    const { queue, metrics } = setup(relay);

    queue.submit(outbound('d-1'));
    queue.submit(outbound('d-2'));

    expect((await metrics.queueSize.get()).values[0].value).toBe(2);

    await vi.waitFor(() => expect(relay.calls).toBe(2));
    gates.forEach((gate) => gate.resolve({ ok: true }));
    await queue.waitForIdle();

    expect((await metrics.queueSize.get()).values[0].value).toBe(0);
  });

  it('should resolve waitForIdle immediately when nothing was submitted', async () => {
    const { relay } = gatedRelay();
    const { queue } = setup(relay);

    await expect(queue.waitForIdle()).resolves.toBeUndefined();
    await queue.stop();
  });
});
