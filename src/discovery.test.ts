import { beforeEach, describe, expect, it, vi } from 'vitest';

const { list } = vi.hoisted(() => ({ list: vi.fn() }));

vi.mock('serialport', () => ({
  SerialPort: { list },
}));

import { discoverAdapters } from './discovery';

describe('discoverAdapters', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    list.mockReset();
  });

  it('keeps only ports with the BLED112 USB ids', async () => {
    list.mockResolvedValue([
      {
        path: '/dev/ttyACM0',
        manufacturer: 'Bluegiga',
        serialNumber: '1',
        vendorId: '2458',
        productId: '0001',
      },
      { path: '/dev/ttyUSB0', vendorId: '0403', productId: '6001' },
      { path: '/dev/ttyS0' },
    ]);

    await expect(discoverAdapters()).resolves.toEqual([
      { path: '/dev/ttyACM0', manufacturer: 'Bluegiga', serialNumber: '1' },
    ]);
    expect(console.log).toHaveBeenCalledWith(
      'Found 1 BLED112 adapter(s) among 3 serial ports'
    );
  });

  it('requires both vendor and product id', async () => {
    list.mockResolvedValue([
      { path: 'COM3', vendorId: '2458', productId: '0001' },
      { path: 'COM4', vendorId: '2458', productId: '0002' },
    ]);

    const adapters = await discoverAdapters();
    expect(adapters.map((adapter) => adapter.path)).toEqual(['COM3']);
  });

  it('returns an empty list without adapters', async () => {
    list.mockResolvedValue([]);

    await expect(discoverAdapters()).resolves.toEqual([]);
  });
});
