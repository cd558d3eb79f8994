/**
 * GATT client on top of the BGAPI engine.
 */

import { Bled112Client } from './client';
import { GattError, InvalidFrameError, NotConnectedError } from './exceptions';
import type { AdapterInfo } from './models/adapter-info';
import { formatAddress, formatUuid } from './models/address';
import { compareBytes } from './protocol/bytes';
import {
  AttclientAttributeWrite,
  AttclientFindInformation,
  AttclientReadByHandle,
  ConnectionDisconnect,
  GapConnectDirect,
  SystemAddressGet,
  SystemGetInfo,
  SystemHello,
  SystemReset,
} from './protocol/commands';
import {
  AddressType,
  ConnectionFlags,
  FIRST_ATTRIBUTE_HANDLE,
  LAST_ATTRIBUTE_HANDLE,
  ResultCode,
  describeResult,
} from './protocol/constants';
import { on, type Handler } from './protocol/dispatch';
import {
  AttclientAttributeValueEvent,
  AttclientFindInformationFoundEvent,
  AttclientProcedureCompletedEvent,
  ConnectionDisconnectedEvent,
  ConnectionStatusEvent,
} from './protocol/events';
import {
  AttclientAttributeWriteResponse,
  AttclientFindInformationResponse,
  AttclientReadByHandleResponse,
  ConnectionDisconnectResponse,
  GapConnectDirectResponse,
  SystemAddressGetResponse,
  SystemGetInfoResponse,
  SystemHelloResponse,
} from './protocol/responses';

/**
 * Connection parameters for `connect()`.
 */
export interface GattClientOptions {
  /** Minimum connection interval, units of 1.25ms */
  connIntervalMin?: number;
  /** Maximum connection interval, units of 1.25ms */
  connIntervalMax?: number;
  /** Supervision timeout, units of 10ms */
  timeout?: number;
  /** Slave latency, in connection events */
  latency?: number;
}

interface DiscoveredAttribute {
  uuid: Uint8Array;
  handle: number;
}

/**
 * One peripheral connection through a BLED112 dongle.
 *
 * Every method sends one command and waits for its response and the events
 * that finish the procedure. Other messages arriving meanwhile are dropped.
 *
 * @example
 * ```typescript
 * const gatt = new GattClient(new Bled112Client(transport));
 * await gatt.connect(parseAddress('00:07:80:12:34:56'));
 * await gatt.discover();
 * const handle = gatt.characteristics().get('2a00');
 * const name = await gatt.readAttribute(handle ?? 0);
 * await gatt.disconnect();
 * ```
 */
export class GattClient {
  static readonly DEFAULT_CONN_INTERVAL_MIN = 60; // 75ms
  static readonly DEFAULT_CONN_INTERVAL_MAX = 76; // 95ms
  static readonly DEFAULT_TIMEOUT = 100; // 1s
  static readonly DEFAULT_LATENCY = 0;
  // uint8 length prefix of attribute write
  static readonly MAX_ATTRIBUTE_LENGTH = 0xff;

  private connection: number | null = null;
  private attributes: DiscoveredAttribute[] = [];

  constructor(
    private readonly client: Bled112Client,
    private readonly options: GattClientOptions = {}
  ) {}

  /**
   * Check if a peripheral connection is open.
   */
  get isConnected(): boolean {
    return this.connection !== null;
  }

  /**
   * Handle of the open connection, if any.
   */
  get connectionHandle(): number | null {
    return this.connection;
  }

  /**
   * Round-trip a no-op command to check the adapter responds.
   */
  async hello(): Promise<void> {
    await this.client.send(SystemHello, {});
    await this.client.receiveExpected(SystemHelloResponse);
  }

  /**
   * Read adapter firmware and hardware versions.
   */
  async getInfo(): Promise<AdapterInfo> {
    await this.client.send(SystemGetInfo, {});
    const info = await this.client.receiveExpected(SystemGetInfoResponse);

    return {
      version: `${info.major}.${info.minor}.${info.patch}`,
      build: info.build,
      llVersion: info.llVersion,
      protocolVersion: info.protocolVersion,
      hardware: info.hardware,
    };
  }

  /**
   * Read the adapter's own Bluetooth address.
   */
  async getAddress(): Promise<string> {
    await this.client.send(SystemAddressGet, {});
    const { address } = await this.client.receiveExpected(SystemAddressGetResponse);
    return formatAddress(address);
  }

  /**
   * Reset the adapter.
   *
   * The adapter does not answer; it re-enumerates on USB and sends a boot
   * event. Any open connection is lost.
   */
  async reset(bootInDfu: boolean = false): Promise<void> {
    console.log(`Resetting adapter${bootInDfu ? ' into DFU mode' : ''}`);
    await this.client.send(SystemReset, { bootInDfu: bootInDfu ? 1 : 0 });
    this.connection = null;
    this.attributes = [];
  }

  /**
   * Connect to a peripheral and wait until the link is up.
   *
   * @param address - 6 bytes, least significant first (see `parseAddress`)
   * @throws {GattError} If the adapter refuses the connection request
   */
  async connect(
    address: Uint8Array,
    addressType: AddressType = AddressType.PUBLIC
  ): Promise<void> {
    console.log(`Connecting to ${formatAddress(address)}`);

    await this.client.send(GapConnectDirect, {
      address,
      addressType,
      connIntervalMin: this.options.connIntervalMin ?? GattClient.DEFAULT_CONN_INTERVAL_MIN,
      connIntervalMax: this.options.connIntervalMax ?? GattClient.DEFAULT_CONN_INTERVAL_MAX,
      timeout: this.options.timeout ?? GattClient.DEFAULT_TIMEOUT,
      latency: this.options.latency ?? GattClient.DEFAULT_LATENCY,
    });
    const response = await this.client.receiveExpected(GapConnectDirectResponse);
    this.checkResult('gap_connect_direct', response.result);

    let linked: true | undefined;
    await this.receiveUntil(
      () => linked,
      on(ConnectionStatusEvent, (status) => {
        if (
          status.connection === response.connection &&
          (status.flags & ConnectionFlags.CONNECTED) !== 0
        ) {
          linked = true;
        }
      })
    );

    this.connection = response.connection;
    this.attributes = [];
    console.log(`Connected to ${formatAddress(address)} (connection ${this.connection})`);
  }

  /**
   * Close the connection and wait for the adapter to confirm it.
   *
   * @throws {NotConnectedError} If there is no connection
   * @throws {GattError} If the adapter rejects the request
   */
  async disconnect(): Promise<void> {
    const connection = this.ensureConnected();

    await this.client.send(ConnectionDisconnect, { connection });
    const response = await this.client.receiveExpected(ConnectionDisconnectResponse);
    this.checkResult('connection_disconnect', response.result);

    let observed: number | undefined;
    const reason = await this.receiveUntil(
      () => observed,
      on(ConnectionDisconnectedEvent, (event) => {
        if (event.connection === connection) {
          observed = event.reason;
        }
      })
    );

    this.connection = null;
    console.log(`Disconnected (connection ${connection}, reason ${describeResult(reason)})`);
  }

  /**
   * Discover every attribute of the peer with find information.
   *
   * Results replace those of an earlier discovery and are available from
   * `characteristics()`.
   *
   * @throws {GattError} If the procedure fails
   */
  async discover(): Promise<void> {
    const connection = this.ensureConnected();

    await this.client.send(AttclientFindInformation, {
      connection,
      start: FIRST_ATTRIBUTE_HANDLE,
      end: LAST_ATTRIBUTE_HANDLE,
    });
    const response = await this.client.receiveExpected(AttclientFindInformationResponse);
    this.checkResult('attclient_find_information', response.result);

    const found: DiscoveredAttribute[] = [];
    let completed: number | undefined;
    const result = await this.receiveUntil(
      () => completed,
      on(AttclientFindInformationFoundEvent, (event, uuid) => {
        if (event.connection === connection) {
          found.push({ uuid, handle: event.chrHandle });
        }
      }),
      on(AttclientProcedureCompletedEvent, (event) => {
        if (event.connection === connection) {
          completed = event.result;
        }
      })
    );
    this.checkResult('attclient_find_information', result);

    if (found.length === 0) {
      console.warn('Find information completed without any attributes');
    }
    this.attributes = found.sort((a, b) => compareBytes(a.uuid, b.uuid));
    console.log(`Discovered ${found.length} attributes`);
  }

  /**
   * Attributes found by the last `discover()`, UUID to handle, ordered by
   * the UUID bytes. When a UUID occurs more than once, the last handle wins.
   */
  characteristics(): Map<string, number> {
    return new Map(
      this.attributes.map(({ uuid, handle }) => [formatUuid(uuid), handle])
    );
  }

  /**
   * Write an attribute value and wait for the procedure to complete.
   *
   * @throws {InvalidFrameError} If `data` is longer than 255 bytes
   * @throws {GattError} If the write is rejected or fails
   */
  async writeAttribute(handle: number, data: Uint8Array): Promise<void> {
    const connection = this.ensureConnected();
    if (data.length > GattClient.MAX_ATTRIBUTE_LENGTH) {
      throw new InvalidFrameError(
        `Attribute value of ${data.length} bytes exceeds ${GattClient.MAX_ATTRIBUTE_LENGTH}`
      );
    }

    await this.client.send(
      AttclientAttributeWrite,
      { connection, attHandle: handle, length: data.length },
      data
    );
    const response = await this.client.receiveExpected(AttclientAttributeWriteResponse);
    this.checkResult('attclient_attribute_write', response.result);

    const result = await this.waitForProcedure(connection);
    this.checkResult('attclient_attribute_write', result);
  }

  /**
   * Read an attribute value by handle.
   *
   * @throws {GattError} If the read is rejected or fails
   */
  async readAttribute(handle: number): Promise<Uint8Array> {
    const connection = this.ensureConnected();

    await this.client.send(AttclientReadByHandle, { connection, chrHandle: handle });
    const response = await this.client.receiveExpected(AttclientReadByHandleResponse);
    this.checkResult('attclient_read_by_handle', response.result);

    let outcome: { value: Uint8Array } | { failure: number } | undefined;
    const read = await this.receiveUntil(
      () => outcome,
      on(AttclientAttributeValueEvent, (event, value) => {
        if (event.connection === connection && event.attHandle === handle) {
          outcome = { value };
        }
      }),
      // A successful read ends with the value event; only failures complete it.
      on(AttclientProcedureCompletedEvent, (event) => {
        if (event.connection === connection && event.result !== ResultCode.SUCCESS) {
          outcome = { failure: event.result };
        }
      })
    );

    if ('failure' in read) {
      throw new GattError('attclient_read_by_handle', read.failure);
    }
    return read.value;
  }

  /**
   * Wait for the next message and, if it is an attribute value (such as a
   * notification), pass it to `callback`. Other messages are dropped.
   *
   * @returns Whether `callback` was called
   */
  async readNextValue(
    callback: (handle: number, value: Uint8Array) => void | Promise<void>
  ): Promise<boolean> {
    return this.client.receiveOneOf(
      on(AttclientAttributeValueEvent, (event, value) => callback(event.attHandle, value))
    );
  }

  private async waitForProcedure(connection: number): Promise<number> {
    let result: number | undefined;
    return this.receiveUntil(
      () => result,
      on(AttclientProcedureCompletedEvent, (event) => {
        if (event.connection === connection) {
          result = event.result;
        }
      })
    );
  }

  /**
   * Dispatch messages among `handlers`, one at a time, until `outcome`
   * returns a value.
   */
  private async receiveUntil<R>(
    outcome: () => R | undefined,
    ...handlers: Handler[]
  ): Promise<R> {
    for (;;) {
      await this.client.receiveOneOf(...handlers);
      const value = outcome();
      if (value !== undefined) {
        return value;
      }
    }
  }

  private checkResult(operation: string, result: number): void {
    if (result !== ResultCode.SUCCESS) {
      throw new GattError(operation, result);
    }
  }

  /**
   * Ensure a connection is open and return its handle.
   */
  private ensureConnected(): number {
    if (this.connection === null) {
      throw new NotConnectedError('Not connected to a peripheral');
    }
    return this.connection;
  }
}
