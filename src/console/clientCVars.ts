import type {
  NetEmulatedClientTransport,
  NetEmulationConfig,
} from "../transport/NetEmulatedClientTransport.js";
import type { CVar } from "./CVar.js";
import type { CVarRegistry } from "./CVarRegistry.js";

export interface ClientCVars {
  cl_netem: CVar<boolean>;
  cl_netem_tx_loss_pct: CVar<number>;
  cl_netem_rx_loss_pct: CVar<number>;
  cl_netem_tx_latency_ms: CVar<number>;
  cl_netem_rx_latency_ms: CVar<number>;
  cl_netem_tx_jitter_ms: CVar<number>;
  cl_netem_rx_jitter_ms: CVar<number>;
}

function netemNumber(registry: CVarRegistry, name: string, description: string, max: number) {
  return registry.register({
    name,
    description,
    type: "number",
    defaultValue: 0,
    min: 0,
    max,
    category: "cl",
  });
}

export function registerClientCVars(registry: CVarRegistry): ClientCVars {
  return {
    cl_netem: registry.register({
      name: "cl_netem",
      description: "Enable client network emulation (loss/latency/jitter)",
      type: "boolean",
      defaultValue: false,
      category: "cl",
    }),
    cl_netem_tx_loss_pct: netemNumber(
      registry,
      "cl_netem_tx_loss_pct",
      "Outgoing packet loss (%)",
      100,
    ),
    cl_netem_rx_loss_pct: netemNumber(
      registry,
      "cl_netem_rx_loss_pct",
      "Incoming packet loss (%)",
      100,
    ),
    cl_netem_tx_latency_ms: netemNumber(
      registry,
      "cl_netem_tx_latency_ms",
      "Outgoing latency (ms)",
      5000,
    ),
    cl_netem_rx_latency_ms: netemNumber(
      registry,
      "cl_netem_rx_latency_ms",
      "Incoming latency (ms)",
      5000,
    ),
    cl_netem_tx_jitter_ms: netemNumber(
      registry,
      "cl_netem_tx_jitter_ms",
      "Outgoing jitter (ms)",
      2000,
    ),
    cl_netem_rx_jitter_ms: netemNumber(
      registry,
      "cl_netem_rx_jitter_ms",
      "Incoming jitter (ms)",
      2000,
    ),
  };
}

function readNetem(cvars: ClientCVars): NetEmulationConfig {
  return {
    enabled: cvars.cl_netem.get(),
    txLossPct: cvars.cl_netem_tx_loss_pct.get(),
    rxLossPct: cvars.cl_netem_rx_loss_pct.get(),
    txLatencyMs: cvars.cl_netem_tx_latency_ms.get(),
    rxLatencyMs: cvars.cl_netem_rx_latency_ms.get(),
    txJitterMs: cvars.cl_netem_tx_jitter_ms.get(),
    rxJitterMs: cvars.cl_netem_rx_jitter_ms.get(),
  };
}

/**
 * Push the netem cvars into `netem` now and on every change.
 * Returns a function that detaches the listeners.
 */
export function bindNetEmulation(
  cvars: ClientCVars,
  netem: NetEmulatedClientTransport,
): () => void {
  const apply = () => netem.setConfig(readNetem(cvars));
  apply();
  const unsubs = [
    cvars.cl_netem.onChange(apply),
    cvars.cl_netem_tx_loss_pct.onChange(apply),
    cvars.cl_netem_rx_loss_pct.onChange(apply),
    cvars.cl_netem_tx_latency_ms.onChange(apply),
    cvars.cl_netem_rx_latency_ms.onChange(apply),
    cvars.cl_netem_tx_jitter_ms.onChange(apply),
    cvars.cl_netem_rx_jitter_ms.onChange(apply),
  ];
  return () => {
    for (const unsub of unsubs) unsub();
  };
}
