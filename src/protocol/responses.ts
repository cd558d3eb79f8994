/**
 * BGAPI responses. Each answers the command with the same class and command id.
 */

import { MessageClass, MessageType } from './constants';
import { bdAddr, uint16, uint8 } from './fields';
import { defineMessage } from './message';

export const SystemHelloResponse = defineMessage({
  name: 'system_hello',
  messageType: MessageType.COMMAND,
  classId: MessageClass.SYSTEM,
  commandId: 1,
  schema: {},
});

export const SystemAddressGetResponse = defineMessage({
  name: 'system_address_get',
  messageType: MessageType.COMMAND,
  classId: MessageClass.SYSTEM,
  commandId: 2,
  schema: {
    address: bdAddr,
  },
});

export const SystemGetInfoResponse = defineMessage({
  name: 'system_get_info',
  messageType: MessageType.COMMAND,
  classId: MessageClass.SYSTEM,
  commandId: 8,
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

export const ConnectionDisconnectResponse = defineMessage({
  name: 'connection_disconnect',
  messageType: MessageType.COMMAND,
  classId: MessageClass.CONNECTION,
  commandId: 0,
  schema: {
    connection: uint8,
    result: uint16,
  },
});

export const ConnectionGetStatusResponse = defineMessage({
  name: 'connection_get_status',
  messageType: MessageType.COMMAND,
  classId: MessageClass.CONNECTION,
  commandId: 7,
  schema: {
    connection: uint8,
  },
});

export const AttclientFindInformationResponse = defineMessage({
  name: 'attclient_find_information',
  messageType: MessageType.COMMAND,
  classId: MessageClass.ATTRIBUTE_CLIENT,
  commandId: 3,
  schema: {
    connection: uint8,
    result: uint16,
  },
});

export const AttclientReadByHandleResponse = defineMessage({
  name: 'attclient_read_by_handle',
  messageType: MessageType.COMMAND,
  classId: MessageClass.ATTRIBUTE_CLIENT,
  commandId: 4,
  schema: {
    connection: uint8,
    result: uint16,
  },
});

export const AttclientAttributeWriteResponse = defineMessage({
  name: 'attclient_attribute_write',
  messageType: MessageType.COMMAND,
  classId: MessageClass.ATTRIBUTE_CLIENT,
  commandId: 5,
  schema: {
    connection: uint8,
    result: uint16,
  },
});

export const GapConnectDirectResponse = defineMessage({
  name: 'gap_connect_direct',
  messageType: MessageType.COMMAND,
  classId: MessageClass.GAP,
  commandId: 3,
  schema: {
    result: uint16,
    connection: uint8,
  },
});
