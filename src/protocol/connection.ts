/**
 * TraCI client: one request/response session over TCP.
 *
 * Requests are strictly sequential: a caller awaits each answer before issuing
 * the next command. Subscription results arrive with every simulation step and
 * replace the previous step's results.
 */

import * as net from 'net';
import { setTimeout as delay } from 'timers/promises';
import { ConnectError, ProtocolError } from '../errors';
import {
  CMD_CLOSE,
  CMD_GETVERSION,
  CMD_SETORDER,
  CMD_SIMSTEP,
  DOMAIN_COMMANDS,
  INVALID_DOUBLE_VALUE,
  RESPONSE_OFFSET,
  RTYPE_OK,
  domainForSubscriptionResponse,
  type Domain,
} from './constants';
import {
  StorageReader,
  StorageWriter,
  encodeCommand,
  encodeMessage,
  expectOk,
  type TraciValue,
} from './codec';

// ── Types ───────────────────────────────────────────────────────────

export type VariableValues = ReadonlyMap<number, TraciValue>;

export interface EngineVersion {
  apiVersion: number;
  version: string;
}

/**
 * The capability shared with state subsystems. It can subscribe and query
 * but cannot step, reorder or close the session.
 */
export interface ConnectionHandle {
  subscribe(domain: Domain, objectId: string, varIds: readonly number[]): Promise<void>;
  getSubscriptionResults(domain: Domain, objectId: string): VariableValues | undefined;
  getAllSubscriptionResults(domain: Domain): ReadonlyMap<string, VariableValues>;
  getVariable(domain: Domain, varId: number, objectId: string): Promise<TraciValue>;
}

/** The full session, owned by SimControl. */
export interface Connection extends ConnectionHandle {
  readonly port: number;
  getVersion(): Promise<EngineVersion>;
  setOrder(order: number): Promise<void>;
  simulationStep(targetTime?: number): Promise<void>;
  close(): Promise<void>;
  isClosed(): boolean;
}

export interface ProtocolClient {
  /** Open a session, retrying up to `maxAttempts` times while the engine boots. */
  connect(port: number, maxAttempts: number): Promise<Connection>;
}

export interface TraciClientOptions {
  host?: string;
  /** Fixed wait between connection attempts, in milliseconds */
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

// ── Framing channel ─────────────────────────────────────────────────

interface PendingRequest {
  resolve: (body: Buffer) => void;
  reject: (error: Error) => void;
}

class MessageChannel {
  private buffer: Buffer = Buffer.alloc(0);
  private readonly pending: PendingRequest[] = [];
  private failure: Error | null = null;

  constructor(private readonly socket: net.Socket) {
    socket.on('data', (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk]);
      this.flush();
    });
    socket.on('error', (err: Error) => {
      this.fail(new ProtocolError(`Control connection failed: ${err.message}`, { cause: err }));
    });
    socket.on('close', () => {
      this.fail(new ProtocolError('Control connection closed by the engine'));
    });
  }

  /** Send one framed message and resolve with the body of the answer. */
  request(message: Buffer): Promise<Buffer> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject });
      this.socket.write(message);
    });
  }

  destroy(): void {
    this.fail(new ProtocolError('Control connection closed'));
    this.socket.destroy();
  }

  private flush(): void {
    while (this.pending.length > 0 && this.buffer.length >= 4) {
      const total = this.buffer.readInt32BE(0);
      if (total < 4) {
        this.fail(new ProtocolError(`Invalid message length ${total}`));
        this.socket.destroy();
        return;
      }
      if (this.buffer.length < total) return;

      const body = this.buffer.subarray(4, total);
      this.buffer = this.buffer.subarray(total);
      this.pending.shift()?.resolve(body);
    }
  }

  private fail(error: Error): void {
    if (this.failure === null) {
      this.failure = error;
    }
    for (const request of this.pending.splice(0)) {
      request.reject(this.failure);
    }
  }
}

// ── Connection ──────────────────────────────────────────────────────

export class TraciConnection implements Connection {
  private readonly channel: MessageChannel;
  private results = new Map<Domain, Map<string, Map<number, TraciValue>>>();
  private closed = false;

  constructor(socket: net.Socket, readonly port: number) {
    this.channel = new MessageChannel(socket);
  }

  async getVersion(): Promise<EngineVersion> {
    const reader = await this.request(CMD_GETVERSION);
    reader.readLength();
    const commandId = reader.readUbyte();
    if (commandId !== CMD_GETVERSION) {
      throw new ProtocolError(`Unexpected version answer 0x${commandId.toString(16)}`);
    }
    return { apiVersion: reader.readInt(), version: reader.readString() };
  }

  async setOrder(order: number): Promise<void> {
    await this.request(CMD_SETORDER, new StorageWriter().writeInt(order).toBuffer());
  }

  async simulationStep(targetTime = 0): Promise<void> {
    const reader = await this.request(CMD_SIMSTEP, new StorageWriter().writeDouble(targetTime).toBuffer());

    this.results = new Map();
    const count = reader.readInt();
    for (let i = 0; i < count; i++) {
      this.readSubscription(reader);
    }
  }

  async subscribe(
    domain: Domain,
    objectId: string,
    varIds: readonly number[],
    begin = INVALID_DOUBLE_VALUE,
    end = INVALID_DOUBLE_VALUE,
  ): Promise<void> {
    const content = new StorageWriter()
      .writeDouble(begin)
      .writeDouble(end)
      .writeString(objectId)
      .writeUbyte(varIds.length);
    for (const varId of varIds) {
      content.writeUbyte(varId);
    }

    const reader = await this.request(DOMAIN_COMMANDS[domain].subscribe, content.toBuffer());
    if (varIds.length > 0) {
      this.readSubscription(reader);
    }
  }

  getSubscriptionResults(domain: Domain, objectId: string): VariableValues | undefined {
    return this.results.get(domain)?.get(objectId);
  }

  getAllSubscriptionResults(domain: Domain): ReadonlyMap<string, VariableValues> {
    return this.results.get(domain) ?? new Map();
  }

  async getVariable(domain: Domain, varId: number, objectId: string): Promise<TraciValue> {
    const commandId = DOMAIN_COMMANDS[domain].get;
    const reader = await this.request(
      commandId,
      new StorageWriter().writeUbyte(varId).writeString(objectId).toBuffer(),
    );

    reader.readLength();
    const responseId = reader.readUbyte();
    if (responseId !== commandId + RESPONSE_OFFSET) {
      throw new ProtocolError(`Unexpected answer 0x${responseId.toString(16)} to get command 0x${commandId.toString(16)}`);
    }
    const answeredVar = reader.readUbyte();
    const answeredObject = reader.readString();
    if (answeredVar !== varId || answeredObject !== objectId) {
      throw new ProtocolError(`Answer for 0x${answeredVar.toString(16)} "${answeredObject}" does not match the request`);
    }
    return reader.readTypedValue();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      await this.request(CMD_CLOSE);
    } finally {
      this.channel.destroy();
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Drop the socket without the close handshake. */
  abort(): void {
    this.closed = true;
    this.channel.destroy();
  }

  private async request(commandId: number, content?: Buffer): Promise<StorageReader> {
    const body = await this.channel.request(encodeMessage([encodeCommand(commandId, content)]));
    const reader = new StorageReader(body);
    expectOk(reader, commandId);
    return reader;
  }

  private readSubscription(reader: StorageReader): void {
    reader.readLength();
    const responseId = reader.readUbyte();
    const domain = domainForSubscriptionResponse(responseId);
    if (domain === null) {
      throw new ProtocolError(`Unsupported subscription response 0x${responseId.toString(16)}`);
    }

    const objectId = reader.readString();
    const numVars = reader.readUbyte();

    let byObject = this.results.get(domain);
    if (!byObject) {
      byObject = new Map();
      this.results.set(domain, byObject);
    }
    const values = byObject.get(objectId) ?? new Map<number, TraciValue>();
    byObject.set(objectId, values);

    for (let i = 0; i < numVars; i++) {
      const varId = reader.readUbyte();
      const status = reader.readUbyte();
      const value = reader.readTypedValue();
      if (status === RTYPE_OK) {
        values.set(varId, value);
      } else {
        console.warn(
          `[Protocol] Subscription ${domain}/"${objectId}" variable 0x${varId.toString(16)} failed: ${String(value)}`,
        );
      }
    }
  }
}

// ── Client ──────────────────────────────────────────────────────────

function openSocket(host: string, port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });

    const onError = (err: Error): void => {
      socket.destroy();
      reject(err);
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      socket.off('error', onError);
      socket.setNoDelay(true);
      resolve(socket);
    });
  });
}

export class TraciClient implements ProtocolClient {
  private readonly host: string;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: TraciClientOptions = {}) {
    this.host = options.host ?? 'localhost';
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  async connect(port: number, maxAttempts: number): Promise<Connection> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let connection: TraciConnection | null = null;
      try {
        const socket = await openSocket(this.host, port);
        connection = new TraciConnection(socket, port);
        const { apiVersion, version } = await connection.getVersion();
        console.log(`[Protocol] Connected to ${version} (API ${apiVersion}) on ${this.host}:${port}`);
        return connection;
      } catch (err) {
        lastError = err;
        connection?.abort();
        if (attempt < maxAttempts) {
          await this.sleep(this.retryDelayMs);
        }
      }
    }

    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    throw new ConnectError(
      `Could not connect to the engine on ${this.host}:${port} after ${maxAttempts} attempts: ${reason}`,
      { cause: lastError },
    );
  }
}
