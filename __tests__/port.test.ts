import { describe, it, expect } from 'vitest';
import { PortExhaustedError } from '../src/errors.js';
import { findFreePort, PortAllocator } from '../src/port.js';

describe('findFreePort', () => {
  it('returns an OS-assigned port', async () => {
    const port = await findFreePort();
    expect(port).toBeGreaterThan(0);
    expect(port).toBeLessThanOrEqual(65535);
  });
});

describe('PortAllocator', () => {
  it('claims a requested port', async () => {
    const ports = new PortAllocator();

    expect(await ports.allocate(5432)).toBe(5432);
    expect(ports.isClaimed(5432)).toBe(true);
  });

  it('moves past ports already claimed in this process', async () => {
    const ports = new PortAllocator();

    expect(await ports.allocate(5432)).toBe(5432);
    expect(await ports.allocate(5432)).toBe(5433);
    expect(await ports.allocate(5432)).toBe(5434);
    expect(ports.claimedPorts).toEqual([5432, 5433, 5434]);
  });

  it('returns the requested port unclaimed when reuse is allowed', async () => {
    const ports = new PortAllocator();
    await ports.allocate(6000);

    expect(await ports.allocate(6000, true)).toBe(6000);
    expect(await ports.allocate(7000, true)).toBe(7000);
    expect(ports.isClaimed(7000)).toBe(false);
  });

  it('wraps past 65535 to the first unprivileged port', async () => {
    const ports = new PortAllocator();
    await ports.allocate(65535);

    expect(await ports.allocate(65535)).toBe(1024);
  });

  it('keeps privileged requests in the privileged range until they wrap', async () => {
    const ports = new PortAllocator();

    expect(await ports.allocate(80)).toBe(80);
    expect(await ports.allocate(80)).toBe(81);
  });

  it('hands a released port out again', async () => {
    const ports = new PortAllocator();
    await ports.allocate(6000);
    ports.release(6000);

    expect(await ports.allocate(6000)).toBe(6000);
  });

  it('claims looked-up ports too, so two auto allocations never collide', async () => {
    const ports = new PortAllocator(async () => 41000);

    expect(await ports.allocate()).toBe(41000);
    expect(await ports.allocate()).toBe(41001);
  });

  it('gives distinct ports to concurrent auto allocations', async () => {
    const ports = new PortAllocator();
    const allocated = await Promise.all([ports.allocate(), ports.allocate(), ports.allocate()]);

    expect(new Set(allocated).size).toBe(3);
  });

  it('fails once every unprivileged port is claimed', async () => {
    const ports = new PortAllocator();
    for (let port = 1024; port <= 65535; port++) {
      ports.claim(port);
    }

    await expect(ports.allocate(2000)).rejects.toBeInstanceOf(PortExhaustedError);
  });
});
