import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ChannelProvisioner } from '../../src/core/connection/ChannelProvisioner';
import { TopologyConflictError, TransportError } from '../../src/core';
import { MockConnectionSource } from '../helpers/Broker';

describe('ChannelProvisioner', () => {
  let source: MockConnectionSource;

  beforeEach(() => {
    source = new MockConnectionSource();
  });

  it('should open the channel lazily and return the same handle afterwards', async () => {
    const provisioner = new ChannelProvisioner(source, { label: 'producer' });

    expect(source.connection.createChannel).not.toHaveBeenCalled();
    expect(provisioner.hasChannel()).toBe(false);

    const first = await provisioner.getChannel();
    const second = await provisioner.getChannel();

    expect(first).toBe(second);
    expect(first).toBe(source.channel(0));
    expect(source.connection.createChannel).toHaveBeenCalledTimes(1);
    expect(provisioner.hasChannel()).toBe(true);
  });

  it('should share a single open between concurrent callers', async () => {
    const provisioner = new ChannelProvisioner(source);

    const [a, b, c] = await Promise.all([
      provisioner.getChannel(),
      provisioner.getChannel(),
      provisioner.getChannel(),
    ]);

    expect(a).toBe(b);
    expect(b).toBe(c);
    expect(source.connection.createChannel).toHaveBeenCalledTimes(1);
  });

  it('should apply prefetch before handing the channel out', async () => {
    const provisioner = new ChannelProvisioner(source, { prefetch: 5 });

    await provisioner.getChannel();

    expect(source.channel(0).prefetch).toHaveBeenCalledWith(5);
  });

  it('should not call prefetch when it is 0', async () => {
    const provisioner = new ChannelProvisioner(source, { prefetch: 0 });

    await provisioner.getChannel();

    expect(source.channel(0).prefetch).not.toHaveBeenCalled();
  });

  it('should run setup once against the new channel', async () => {
    const setup = vi.fn().mockResolvedValue(undefined);
    const provisioner = new ChannelProvisioner(source, { setup });

    await provisioner.getChannel();
    await provisioner.getChannel();

    expect(setup).toHaveBeenCalledTimes(1);
    expect(setup).toHaveBeenCalledWith(source.channel(0));
  });

  it('should wrap connection failures in TransportError', async () => {
    source.getConnection.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const provisioner = new ChannelProvisioner(source, { label: 'worker-1' });

    const promise = provisioner.getChannel();

    await expect(promise).rejects.toBeInstanceOf(TransportError);
    await expect(promise).rejects.toThrow('Failed to open worker-1 channel: ECONNREFUSED');
  });

  it('should discard the channel and keep bridge errors from setup as they are', async () => {
    const conflict = new TopologyConflictError('conflict');
    const provisioner = new ChannelProvisioner(source, {
      setup: vi.fn().mockRejectedValue(conflict),
    });

    await expect(provisioner.getChannel()).rejects.toBe(conflict);
    expect(source.channel(0).close).toHaveBeenCalledTimes(1);
    expect(provisioner.hasChannel()).toBe(false);
  });

  it('should wrap other setup failures in TransportError', async () => {
    const provisioner = new ChannelProvisioner(source, {
      label: 'producer',
      setup: vi.fn().mockRejectedValue(new Error('boom')),
    });

    await expect(provisioner.getChannel()).rejects.toThrow(
      'Failed to set up producer channel: boom'
    );
  });

  it('should open a fresh channel after the broker closes the current one', async () => {
    const onLost = vi.fn();
    const provisioner = new ChannelProvisioner(source, { label: 'worker-2', onLost });

    const first = await provisioner.getChannel();
    source.channel(0).brokerClose();

    expect(provisioner.hasChannel()).toBe(false);
    expect(onLost).toHaveBeenCalledTimes(1);
    expect(onLost.mock.calls[0][0]).toBeInstanceOf(TransportError);
    expect(onLost.mock.calls[0][0].message).toBe('worker-2 channel closed by broker');

    const second = await provisioner.getChannel();
    expect(second).not.toBe(first);
    expect(source.connection.createChannel).toHaveBeenCalledTimes(2);
  });

  it('should not report a loss when it closes the channel itself', async () => {
    const onLost = vi.fn();
    const provisioner = new ChannelProvisioner(source, { onLost });

    await provisioner.getChannel();
    await provisioner.close();

    expect(source.channel(0).close).toHaveBeenCalledTimes(1);
    expect(onLost).not.toHaveBeenCalled();
    expect(provisioner.hasChannel()).toBe(false);
  });

  it('should tolerate close() without an open channel', async () => {
    const provisioner = new ChannelProvisioner(source);

    await expect(provisioner.close()).resolves.toBeUndefined();
    expect(source.connection.createChannel).not.toHaveBeenCalled();
  });

  it('should swallow errors from closing an already closed channel', async () => {
    const provisioner = new ChannelProvisioner(source);
    await provisioner.getChannel();
    source.channel(0).close.mockRejectedValueOnce(new Error('Channel closed'));

    await expect(provisioner.close()).resolves.toBeUndefined();
  });
});
