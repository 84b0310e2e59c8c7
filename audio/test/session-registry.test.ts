import { describe, it, expect, beforeEach } from 'vitest';
import { ConnectionError, GuildMutex, SessionBusyError, SessionRegistry } from '../src/index.js';
import { FakeResolver, FakeTransport, settle } from './support/fakes.js';

describe('SessionRegistry', () => {
  let transport: FakeTransport;
  let mutex: GuildMutex;
  let registry: SessionRegistry;

  beforeEach(() => {
    transport = new FakeTransport();
    mutex = new GuildMutex();
    registry = new SessionRegistry({
      resolver: new FakeResolver(),
      transport,
      mutex,
      options: { idleTimeoutMs: 60_000 },
    });
  });

  it('returns the same session for repeated lookups of a guild', () => {
    const first = registry.getOrCreate('guild-1');
    const second = registry.getOrCreate('guild-1');

    expect(second).toBe(first);
    expect(registry.size).toBe(1);
    expect(registry.get('guild-1')).toBe(first);
    expect(registry.get('guild-2')).toBeUndefined();
  });

  it('keeps guilds apart', () => {
    const a = registry.getOrCreate('guild-1');
    const b = registry.getOrCreate('guild-2');

    expect(a).not.toBe(b);
    expect(registry.guildIds()).toEqual(['guild-1', 'guild-2']);
  });

  it('refuses to remove a busy session', async () => {
    const session = registry.getOrCreate('guild-1');
    await session.play({ query: 'a', requestedBy: 'user-1', voiceChannelId: 'voice-1' });

    await expect(registry.remove('guild-1')).rejects.toBeInstanceOf(SessionBusyError);
    expect(registry.get('guild-1')).toBe(session);
  });

  it('removes an idle session', async () => {
    const session = registry.getOrCreate('guild-1');

    expect(await registry.remove('guild-1')).toBe(true);
    expect(await registry.remove('guild-1')).toBe(false);
    expect(session.isDestroyed).toBe(true);
    expect(registry.size).toBe(0);
  });

  it('serializes removals across guilds', async () => {
    const first = registry.getOrCreate('guild-1');
    const second = registry.getOrCreate('guild-2');
    let unblock: () => void = () => undefined;
    const busy = mutex.run('guild-1', () => new Promise<void>((resolve) => (unblock = resolve)));

    const removals = Promise.all([registry.remove('guild-1'), registry.remove('guild-2')]);
    await settle();
    expect(first.isDestroyed).toBe(false);
    expect(second.isDestroyed).toBe(false);

    unblock();
    await busy;
    expect(await removals).toEqual([true, true]);
    expect(first.isDestroyed).toBe(true);
    expect(second.isDestroyed).toBe(true);
  });

  it('forgets a session that leaves and creates a fresh one afterwards', async () => {
    const session = registry.getOrCreate('guild-1');
    await session.leave();

    expect(registry.get('guild-1')).toBeUndefined();
    expect(registry.getOrCreate('guild-1')).not.toBe(session);
  });

  it('keeps a guild playing while another guild fails', async () => {
    const failing = registry.getOrCreate('guild-1');
    const healthy = registry.getOrCreate('guild-2');
    await failing.play({ query: 'a1', requestedBy: 'user-1', voiceChannelId: 'voice-1' });
    await healthy.play({ query: 'b1', requestedBy: 'user-2', voiceChannelId: 'voice-2' });
    await healthy.play({ query: 'b2', requestedBy: 'user-2', voiceChannelId: 'voice-2' });
    await settle();

    const [failingStream] = transport.listeners;
    failingStream?.({ type: 'error', error: new Error('decoder exploded') });
    await settle();

    transport.connectFailure = new ConnectionError('channel_full', 'Voice channel is full');
    await expect(
      registry.getOrCreate('guild-3').play({ query: 'c1', requestedBy: 'user-3', voiceChannelId: 'voice-3' }),
    ).rejects.toMatchObject({ kind: 'channel_full' });

    expect(failing.state).toBe('idle');
    expect(healthy.state).toBe('playing');
    expect(healthy.hasConnection).toBe(true);
    expect(healthy.snapshot().current?.title).toBe('b1');
    expect(healthy.snapshot().upcoming.map((t) => t.title)).toEqual(['b2']);
    expect(transport.streamed).toEqual(['tok:a1', 'tok:b1']);
    expect(transport.disconnects).toEqual([]);
  });

  it('leaves every guild on shutdown', async () => {
    await registry.getOrCreate('guild-1').play({ query: 'a', requestedBy: 'user-1', voiceChannelId: 'voice-1' });
    await registry.getOrCreate('guild-2').play({ query: 'b', requestedBy: 'user-2', voiceChannelId: 'voice-9' });

    await registry.shutdown();

    expect(registry.size).toBe(0);
    expect(transport.disconnects.map((h) => h.guildId).sort()).toEqual(['guild-1', 'guild-2']);
    expect(transport.open).toBe(0);
  });
});
