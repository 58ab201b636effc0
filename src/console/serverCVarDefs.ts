import {
  HISTORY_BUFFER_SIZE,
  MAX_SERVER_BUFFER,
  MIN_SERVER_BUFFER,
  TICK_RATE,
} from "../config/constants.js";
import type { CVar, NumberCVarDesc } from "./CVar.js";
import type { CVarRegistry } from "./CVarRegistry.js";

export const SERVER_CVAR_DEFS = {
  sv_tickrate: {
    name: "sv_tickrate",
    description: "Server tick rate (Hz)",
    type: "number",
    defaultValue: TICK_RATE,
    min: 1,
    max: 240,
    category: "sv",
  },
  sv_minbuffer: {
    name: "sv_minbuffer",
    description: "Inputs buffered ahead of the server cursor before it steps",
    type: "number",
    defaultValue: MIN_SERVER_BUFFER,
    min: 0,
    max: 120,
    integer: true,
    category: "sv",
  },
  sv_maxbuffer: {
    name: "sv_maxbuffer",
    description: "Queued inputs ahead of the cursor that trigger a catch-up jump",
    type: "number",
    defaultValue: MAX_SERVER_BUFFER,
    min: 0,
    max: 240,
    integer: true,
    category: "sv",
  },
  net_history: {
    name: "net_history",
    description: "Ticks each controller history keeps (applies to new controllers)",
    type: "number",
    defaultValue: HISTORY_BUFFER_SIZE,
    min: 16,
    max: 65536,
    integer: true,
    category: "net",
  },
} as const satisfies Record<string, NumberCVarDesc>;

export type ServerCVars = { [K in keyof typeof SERVER_CVAR_DEFS]: CVar<number> };

export function registerServerCVars(registry: CVarRegistry): ServerCVars {
  return {
    sv_tickrate: registry.register(SERVER_CVAR_DEFS.sv_tickrate),
    sv_minbuffer: registry.register(SERVER_CVAR_DEFS.sv_minbuffer),
    sv_maxbuffer: registry.register(SERVER_CVAR_DEFS.sv_maxbuffer),
    net_history: registry.register(SERVER_CVAR_DEFS.net_history),
  };
}
