/**
 * BGAPI events raised by the BLED112 without a preceding command.
 *
 * Several events share class and command ids with responses; they differ in
 * payload size, which is what dispatch matches on.
 */

import { MessageClass, MessageType } from './constants';
import { bdAddr, uint16, uint8 } from './fields';
import { defineMessage } from './message';

export const SystemBootEvent = defineMessage({
  name: 'system_boot',
  messageType: MessageType.EVENT,
  classId: MessageClass.SYSTEM,
  commandId: 0,
  schema: {
    major: uint16,
    minor: uint16,
    patch: uint16,
    build: uint16,
    llVersion: uint16,
    protocolVersion: uint8,
    hardware: uint8,
  },
});

/**
 * Connection state changed. See `ConnectionFlags` for `flags`.
 */
export const ConnectionStatusEvent = defineMessage({
  name: 'connection_status',
  messageType: MessageType.EVENT,
  classId: MessageClass.CONNECTION,
  commandId: 0,
  schema: {
    connection: uint8,
    flags: uint8,
    address: bdAddr,
    addressType: uint8,
    connInterval: uint16,
    timeout: uint16,
    latency: uint16,
    bonding: uint8,
  },
});

export const ConnectionDisconnectedEvent = defineMessage({
  name: 'connection_disconnected',
  messageType: MessageType.EVENT,
  classId: MessageClass.CONNECTION,
  commandId: 4,
  schema: {
    connection: uint8,
    reason: uint16,
  },
});

export const AttclientProcedureCompletedEvent = defineMessage({
  name: 'attclient_procedure_completed',
  messageType: MessageType.EVENT,
  classId: MessageClass.ATTRIBUTE_CLIENT,
  commandId: 1,
  schema: {
    connection: uint8,
    result: uint16,
    chrHandle: uint16,
  },
});

/**
 * One attribute found by find information; the UUID is the trailing data.
 */
export const AttclientFindInformationFoundEvent = defineMessage({
  name: 'attclient_find_information_found',
  messageType: MessageType.EVENT,
  classId: MessageClass.ATTRIBUTE_CLIENT,
  commandId: 4,
  kind: 'partial',
  schema: {
    connection: uint8,
    chrHandle: uint16,
    length: uint8,
  },
});

/**
 * Attribute value from a read, notification or indication; the value is the
 * trailing data.
 */
export const AttclientAttributeValueEvent = defineMessage({
  name: 'attclient_attribute_value',
  messageType: MessageType.EVENT,
  classId: MessageClass.ATTRIBUTE_CLIENT,
  commandId: 5,
  kind: 'partial',
  schema: {
    connection: uint8,
    attHandle: uint16,
    type: uint8,
    length: uint8,
  },
});
