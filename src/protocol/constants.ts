/**
 * TraCI wire constants: command ids, variable ids and value type tags.
 * Values follow the engine's published protocol tables.
 */

// ── Control commands ────────────────────────────────────────────────

export const CMD_GETVERSION = 0x00;
export const CMD_SIMSTEP = 0x02;
export const CMD_SETORDER = 0x03;
export const CMD_CLOSE = 0x7f;

// ── Domain commands ─────────────────────────────────────────────────

export const CMD_GET_TL_VARIABLE = 0xa2;
export const CMD_GET_VEHICLE_VARIABLE = 0xa4;
export const CMD_GET_SIM_VARIABLE = 0xab;

export const CMD_SUBSCRIBE_TL_VARIABLE = 0xd2;
export const CMD_SUBSCRIBE_VEHICLE_VARIABLE = 0xd4;
export const CMD_SUBSCRIBE_SIM_VARIABLE = 0xdb;

/** Responses to get/subscribe commands carry the command id plus this offset. */
export const RESPONSE_OFFSET = 0x10;

// ── Status codes ────────────────────────────────────────────────────

export const RTYPE_OK = 0x00;
export const RTYPE_NOTIMPLEMENTED = 0x01;
export const RTYPE_ERR = 0xff;

// ── Value type tags ─────────────────────────────────────────────────

export const POSITION_2D = 0x01;
export const TYPE_UBYTE = 0x07;
export const TYPE_BYTE = 0x08;
export const TYPE_INTEGER = 0x09;
export const TYPE_DOUBLE = 0x0b;
export const TYPE_STRING = 0x0c;
export const TYPE_STRINGLIST = 0x0e;
export const TYPE_COMPOUND = 0x0f;
export const TYPE_COLOR = 0x11;

// ── Variables ───────────────────────────────────────────────────────

export const ID_LIST = 0x00;

export const VAR_TIME_STEP = 0x70;
export const VAR_DEPARTED_VEHICLES_IDS = 0x74;
export const VAR_TELEPORT_STARTING_VEHICLES_IDS = 0x76;
export const VAR_ARRIVED_VEHICLES_IDS = 0x7a;
export const VAR_DELTA_T = 0x7b;

export const VAR_SPEED = 0x40;
export const VAR_ROAD_ID = 0x50;
export const VAR_LANEPOSITION = 0x56;

export const TL_RED_YELLOW_GREEN_STATE = 0x20;

/** Begin/end sentinel meaning "for the whole simulation". */
export const INVALID_DOUBLE_VALUE = -1073741824.0;

// ── Domains ─────────────────────────────────────────────────────────

export type Domain = 'simulation' | 'vehicle' | 'trafficLight';

export interface DomainCommands {
  get: number;
  subscribe: number;
}

export const DOMAIN_COMMANDS: Readonly<Record<Domain, DomainCommands>> = {
  simulation: { get: CMD_GET_SIM_VARIABLE, subscribe: CMD_SUBSCRIBE_SIM_VARIABLE },
  vehicle: { get: CMD_GET_VEHICLE_VARIABLE, subscribe: CMD_SUBSCRIBE_VEHICLE_VARIABLE },
  trafficLight: { get: CMD_GET_TL_VARIABLE, subscribe: CMD_SUBSCRIBE_TL_VARIABLE },
};

export const DOMAINS: readonly Domain[] = ['simulation', 'vehicle', 'trafficLight'];

/** Reverse lookup from a subscription response id to its domain. */
export function domainForSubscriptionResponse(responseId: number): Domain | null {
  return DOMAINS.find((domain) => DOMAIN_COMMANDS[domain].subscribe + RESPONSE_OFFSET === responseId) ?? null;
}
