/**
 * Serial port transport for the BLED112 virtual COM port.
 */

import { SerialPort } from 'serialport';
import { TransportError } from '../exceptions';
import { DEFAULT_BAUD_RATE } from '../protocol/constants';
import { StreamTransport } from './stream-transport';

export interface SerialTransportOptions {
  /** Device path, e.g. `/dev/ttyACM0` or `COM3` */
  path: string;

  /**
   * Line speed. The dongle is a USB CDC device and ignores it, but the
   * operating system requires one.
   */
  baudRate?: number;
}

/**
 * Open a serial port and wrap it in a transport.
 *
 * @throws {TransportError} If the port cannot be opened
 *
 * @example
 * ```typescript
 * const transport = await openSerialTransport({ path: '/dev/ttyACM0' });
 * const client = new Bled112Client(transport);
 * ```
 */
export async function openSerialTransport(
  options: SerialTransportOptions
): Promise<StreamTransport> {
  const port = new SerialPort({
    path: options.path,
    baudRate: options.baudRate ?? DEFAULT_BAUD_RATE,
    autoOpen: false,
  });

  await new Promise<void>((resolve, reject) => {
    port.open((error) => {
      if (error) {
        reject(new TransportError(`Failed to open ${options.path}: ${error.message}`));
      } else {
        resolve();
      }
    });
  });

  console.log(`Opened serial port ${options.path}`);
  return new StreamTransport(port);
}
