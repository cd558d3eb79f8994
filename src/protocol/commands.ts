/**
 * BGAPI commands sent from the host to the BLED112.
 */

import { MessageClass, MessageType } from './constants';
import { bdAddr, uint16, uint8 } from './fields';
import { defineMessage } from './message';

/**
 * Reset the adapter. No response is sent; a system boot event follows.
 */
export const SystemReset = defineMessage({
  name: 'system_reset',
  messageType: MessageType.COMMAND,
  classId: MessageClass.SYSTEM,
  commandId: 0,
  schema: {
    bootInDfu: uint8,
  },
});

export const SystemHello = defineMessage({
  name: 'system_hello',
  messageType: MessageType.COMMAND,
  classId: MessageClass.SYSTEM,
  commandId: 1,
  schema: {},
});

export const SystemAddressGet = defineMessage({
  name: 'system_address_get',
  messageType: MessageType.COMMAND,
  classId: MessageClass.SYSTEM,
  commandId: 2,
  schema: {},
});

export const SystemGetInfo = defineMessage({
  name: 'system_get_info',
  messageType: MessageType.COMMAND,
  classId: MessageClass.SYSTEM,
  commandId: 8,
  schema: {},
});

export const ConnectionDisconnect = defineMessage({
  name: 'connection_disconnect',
  messageType: MessageType.COMMAND,
  classId: MessageClass.CONNECTION,
  commandId: 0,
  schema: {
    connection: uint8,
  },
});

export const ConnectionGetStatus = defineMessage({
  name: 'connection_get_status',
  messageType: MessageType.COMMAND,
  classId: MessageClass.CONNECTION,
  commandId: 7,
  schema: {
    connection: uint8,
  },
});

/**
 * Discover attribute handles and UUIDs in a handle range.
 * Results arrive as find information found events.
 */
export const AttclientFindInformation = defineMessage({
  name: 'attclient_find_information',
  messageType: MessageType.COMMAND,
  classId: MessageClass.ATTRIBUTE_CLIENT,
  commandId: 3,
  schema: {
    connection: uint8,
    start: uint16,
    end: uint16,
  },
});

export const AttclientReadByHandle = defineMessage({
  name: 'attclient_read_by_handle',
  messageType: MessageType.COMMAND,
  classId: MessageClass.ATTRIBUTE_CLIENT,
  commandId: 4,
  schema: {
    connection: uint8,
    chrHandle: uint16,
  },
});

/**
 * Write an attribute. The value follows the fixed part as trailing bytes and
 * `length` must equal their count.
 */
export const AttclientAttributeWrite = defineMessage({
  name: 'attclient_attribute_write',
  messageType: MessageType.COMMAND,
  classId: MessageClass.ATTRIBUTE_CLIENT,
  commandId: 5,
  kind: 'partial',
  schema: {
    connection: uint8,
    attHandle: uint16,
    length: uint8,
  },
});

/**
 * Connect to a peripheral.
 *
 * Interval units are 1.25ms, timeout units 10ms, latency in connection events.
 */
export const GapConnectDirect = defineMessage({
  name: 'gap_connect_direct',
  messageType: MessageType.COMMAND,
  classId: MessageClass.GAP,
  commandId: 3,
  schema: {
    address: bdAddr,
    addressType: uint8,
    connIntervalMin: uint16,
    connIntervalMax: uint16,
    timeout: uint16,
    latency: uint16,
  },
});
