/**
 * bled112 - BGAPI client for Bluegiga BLED112 USB dongles
 *
 * Main entry point exporting the public API.
 */

// Core client API
export { Bled112Client } from './client';
export { GattClient, type GattClientOptions } from './gatt-client';
export { discoverAdapters, type AdapterPort } from './discovery';

// Transport
export type { Transport } from './transport/transport';
export { StreamTransport } from './transport/stream-transport';
export { openSerialTransport, type SerialTransportOptions } from './transport/serial';

// Protocol and models
export * from './protocol';
export * from './models';

// Exceptions
export * from './exceptions';
