/**
 * Serial port discovery for BLED112 dongles.
 */

import { SerialPort } from 'serialport';
import { BLED112_PRODUCT_ID, BLED112_VENDOR_ID } from './protocol/constants';

/**
 * A serial port backed by a BLED112.
 */
export interface AdapterPort {
  /** Path to pass to `openSerialTransport` */
  path: string;
  manufacturer?: string;
  serialNumber?: string;
}

/**
 * List serial ports whose USB vendor and product ids are the BLED112's.
 *
 * @example
 * ```typescript
 * const [adapter] = await discoverAdapters();
 * const transport = await openSerialTransport({ path: adapter.path });
 * ```
 */
export async function discoverAdapters(): Promise<AdapterPort[]> {
  const ports = await SerialPort.list();

  const adapters = ports
    .filter(
      (port) =>
        port.vendorId?.toLowerCase() === BLED112_VENDOR_ID &&
        port.productId?.toLowerCase() === BLED112_PRODUCT_ID
    )
    .map((port) => ({
      path: port.path,
      manufacturer: port.manufacturer,
      serialNumber: port.serialNumber,
    }));

  console.log(`Found ${adapters.length} BLED112 adapter(s) among ${ports.length} serial ports`);
  return adapters;
}
