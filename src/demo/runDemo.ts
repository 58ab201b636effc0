import { RollbackClient } from "../client/RollbackClient.js";
import { LOCAL_CLIENT_ID } from "../config/constants.js";
import { CVarRegistry } from "../console/CVarRegistry.js";
import { bindNetEmulation, registerClientCVars } from "../console/clientCVars.js";
import type { Tick } from "../history/History.js";
import type { RollbackStats } from "../rollback/RollbackStats.js";
import { RollbackServer } from "../server/RollbackServer.js";
import { netLog } from "../shared/netLog.js";
import { LocalTransport } from "../transport/LocalTransport.js";
import { NetEmulatedClientTransport } from "../transport/NetEmulatedClientTransport.js";
import {
  type CubeInput,
  CubeMover,
  type CubeState,
  cubeInputCodec,
  cubeStateCodec,
} from "./CubeMover.js";
import { Oscillator, type OscillatorState, oscillatorStateCodec } from "./Oscillator.js";

/** Ticks between direction flips of the scripted input. */
const FLIP_EVERY = 90;

export interface DemoOptions {
  durationMs: number;
  /** Seed for the emulated network's loss and jitter. */
  seed?: string;
  /** Half-width of the box only the server knows about. */
  wall?: number;
  /** Console variable assignments applied before the session starts, e.g. `{ sv_minbuffer: "2" }`. */
  cvars?: Record<string, string>;
}

export interface DemoReport {
  ticks: { server: Tick; client: Tick };
  cube: { server: CubeState; client: CubeState };
  obstacle: { server: OscillatorState; client: OscillatorState };
  stats: {
    cubeServer: RollbackStats;
    cubeClient: RollbackStats;
    obstacleServer: RollbackStats;
    obstacleClient: RollbackStats;
  };
  dropped: { tx: number; rx: number };
}

/** Right for FLIP_EVERY ticks, then left, and so on. */
export function scriptedInput(tick: Tick): CubeInput {
  return { moveX: Math.floor(tick / FLIP_EVERY) % 2 === 0 ? 1 : -1, moveY: 0 };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run a server and one client in this process for `durationMs`, both on
 * their own interval loops, the client behind an emulated network. The
 * server's cube is boxed in by walls the client doesn't know about, so the
 * client gets corrected whenever it walks into one.
 */
export async function runDemoSession(options: DemoOptions): Promise<DemoReport> {
  const wall = options.wall ?? 1.5;
  const registry = new CVarRegistry();
  const transport = new LocalTransport();
  const server = new RollbackServer(transport.serverSide, { registry });
  const clientCVars = registerClientCVars(registry);

  for (const [name, value] of Object.entries(options.cvars ?? {})) {
    const cv = registry.get(name);
    if (!cv) throw new Error(`unknown cvar: ${name}`);
    if (!cv.setFromString(value)) throw new Error(`invalid value for ${name}: ${value}`);
  }

  const serverCube = new CubeMover({ minX: -wall, minY: -wall, maxX: wall, maxY: wall });
  const serverCubeCtl = server.addPredicted("cube", LOCAL_CLIENT_ID, serverCube, {
    input: cubeInputCodec,
    state: cubeStateCodec,
  });
  const serverObstacle = new Oscillator();
  const serverObstacleCtl = server.addServerDriven(
    "obstacle",
    serverObstacle,
    oscillatorStateCodec,
  );

  const netem = new NetEmulatedClientTransport(transport.connect(LOCAL_CLIENT_ID), options.seed);
  const unbind = bindNetEmulation(clientCVars, netem);
  const client = new RollbackClient(netem, { tickRate: server.cvars.sv_tickrate.get() });

  const clientCube = new CubeMover();
  client.driver.add({
    preTick: (tick) => {
      clientCube.held = scriptedInput(tick);
    },
  });
  const clientCubeCtl = client.addOwned("cube", clientCube, {
    input: cubeInputCodec,
    state: cubeStateCodec,
  });
  const clientObstacle = new Oscillator();
  const clientObstacleCtl = client.addReplica("obstacle", clientObstacle, oscillatorStateCodec);

  netLog(`[demo] running for ${options.durationMs} ms (${netem.getDebugInfo().transport})`);
  server.start();
  client.start();
  try {
    await sleep(options.durationMs);
  } finally {
    client.stop();
    server.stop();
  }

  const report: DemoReport = {
    ticks: { server: server.driver.currentTick, client: client.driver.currentTick },
    cube: { server: serverCube.gatherState(), client: clientCube.gatherState() },
    obstacle: { server: serverObstacle.gatherState(), client: clientObstacle.gatherState() },
    stats: {
      cubeServer: serverCubeCtl.getStats(),
      cubeClient: clientCubeCtl.getStats(),
      obstacleServer: serverObstacleCtl.getStats(),
      obstacleClient: clientObstacleCtl.getStats(),
    },
    dropped: netem.dropped,
  };

  unbind();
  client.close();
  server.close();
  return report;
}
