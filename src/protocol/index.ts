export * from './constants';

export {
  // Values
  type TraciValue,
  type Position2D,
  type Color,
  type Compound,
  isStringList,
  asStringList,
  asNumber,
  asString,

  // Codec
  StorageReader,
  StorageWriter,
  encodeCommand,
  encodeMessage,
  readStatus,
  expectOk,
  type CommandStatus,
} from './codec';

export {
  type Connection,
  type ConnectionHandle,
  type ProtocolClient,
  type EngineVersion,
  type VariableValues,
  type TraciClientOptions,
  TraciConnection,
  TraciClient,
} from './connection';
