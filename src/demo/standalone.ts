import { initNetLog, installCrashHandlers, netLog } from "../shared/netLog.js";
import { runDemoSession } from "./runDemo.js";

const DURATION_MS = parseInt(process.env.DURATION_MS ?? "5000", 10);
const SEED = process.env.SEED ?? "tickwarp";
const DATA_DIR = process.env.DATA_DIR;

installCrashHandlers();
if (DATA_DIR) initNetLog(DATA_DIR);

// Remaining arguments are cvar assignments: sv_minbuffer=3 cl_netem=1 ...
const cvars: Record<string, string> = {};
for (const arg of process.argv.slice(2)) {
  const eq = arg.indexOf("=");
  if (eq <= 0) {
    netLog(`[demo] ignoring argument "${arg}" (expected name=value)`);
    continue;
  }
  cvars[arg.slice(0, eq)] = arg.slice(eq + 1);
}

const report = await runDemoSession({ durationMs: DURATION_MS, seed: SEED, cvars });

const fmt = (n: number) => n.toFixed(3);
netLog(`[demo] ticks: server ${report.ticks.server}, client ${report.ticks.client}`);
netLog(
  `[demo] cube: server (${fmt(report.cube.server.x)}, ${fmt(report.cube.server.y)}) ` +
    `client (${fmt(report.cube.client.x)}, ${fmt(report.cube.client.y)})`,
);
netLog(`[demo] packets dropped: tx ${report.dropped.tx}, rx ${report.dropped.rx}`);
for (const [name, stats] of Object.entries(report.stats)) {
  netLog(`[demo] ${name}: ${JSON.stringify(stats)}`);
}
