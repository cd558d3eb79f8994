/**
 * BGAPI protocol constants for the BLED112 dongle.
 */

export const HEADER_SIZE = 4;
export const MAX_PAYLOAD_LENGTH = 0x7ff; // 11-bit length field
export const BD_ADDR_SIZE = 6;

// USB identifiers of the BLED112 virtual serial port
export const BLED112_VENDOR_ID = '2458';
export const BLED112_PRODUCT_ID = '0001';
export const DEFAULT_BAUD_RATE = 115200;

/**
 * Header bit 7 of byte 0. Responses travel with the command type.
 */
export enum MessageType {
  COMMAND = 0,
  EVENT = 1,
}

export enum Technology {
  BLUETOOTH_SMART = 0,
  WIFI = 1,
}

/**
 * BGAPI class indexes.
 */
export enum MessageClass {
  SYSTEM = 0,
  PERSISTENT_STORE = 1,
  ATTRIBUTE_DATABASE = 2,
  CONNECTION = 3,
  ATTRIBUTE_CLIENT = 4,
  SECURITY_MANAGER = 5,
  GAP = 6,
  HARDWARE = 7,
  TEST = 8,
  DFU = 9,
}

export enum AddressType {
  PUBLIC = 0,
  RANDOM = 1,
}

/**
 * Bits of the `flags` field in a connection status event.
 */
export enum ConnectionFlags {
  CONNECTED = 0x01,
  ENCRYPTED = 0x02,
  COMPLETED = 0x04,
  PARAMETERS_CHANGE = 0x08,
}

/**
 * `type` field of an attribute value event.
 */
export enum AttributeValueType {
  READ = 0,
  NOTIFY = 1,
  INDICATE = 2,
  READ_BY_TYPE = 3,
  READ_BLOB = 4,
  INDICATE_RSP_REQ = 5,
}

export const FIRST_ATTRIBUTE_HANDLE = 0x0001;
export const LAST_ATTRIBUTE_HANDLE = 0xffff;

/**
 * Result codes the adapter reports in responses and procedure events.
 */
export enum ResultCode {
  SUCCESS = 0x0000,
  INVALID_PARAMETER = 0x0180,
  WRONG_STATE = 0x0181,
  OUT_OF_MEMORY = 0x0182,
  NOT_IMPLEMENTED = 0x0183,
  COMMAND_NOT_RECOGNIZED = 0x0184,
  TIMEOUT = 0x0185,
  NOT_CONNECTED = 0x0186,
  FLOW = 0x0187,
  COMMAND_TOO_LONG = 0x018a,
  CONNECTION_TIMEOUT = 0x0208,
  REMOTE_USER_TERMINATED = 0x0213,
  LOCAL_HOST_TERMINATED = 0x0216,
  INVALID_HANDLE = 0x0401,
  READ_NOT_PERMITTED = 0x0402,
  WRITE_NOT_PERMITTED = 0x0403,
  INSUFFICIENT_AUTHENTICATION = 0x0405,
  ATTRIBUTE_NOT_FOUND = 0x040a,
}

/**
 * Render a result code as `NAME (0x0000)`, or just the hex value when unknown.
 */
export function describeResult(result: number): string {
  const hex = `0x${result.toString(16).padStart(4, '0')}`;
  const name = ResultCode[result];
  return name === undefined ? hex : `${name} (${hex})`;
}
