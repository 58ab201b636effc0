import { TICK_RATE } from "../config/constants.js";
import { type TickPhases, TickDriver } from "../core/TickDriver.js";
import type { Tick } from "../history/History.js";
import type { Authoritative, ServerDriven } from "../rollback/Authoritative.js";
import { NetworkedScene } from "../rollback/NetworkedScene.js";
import { PredictedController } from "../rollback/PredictedController.js";
import type { ControllerSettings } from "../rollback/RollbackController.js";
import { ServerDrivenController } from "../rollback/ServerDrivenController.js";
import { netLog } from "../shared/netLog.js";
import type { PayloadCodec } from "../shared/payloadCodec.js";
import type { ServerMessage } from "../shared/protocol.js";
import type { PredictedCodecs } from "../server/RollbackServer.js";
import type { IClientTransport } from "../transport/Transport.js";

export interface RollbackClientOptions {
  /** Must match the server's sv_tickrate. */
  tickRate?: number;
  historySize?: number;
  payloadCapacity?: number;
}

type TrackedController = TickPhases & {
  receive(tick: Tick, payload: Uint8Array): void;
  dispose(): void;
};

interface ClientRoute {
  receive(tick: Tick, payload: Uint8Array): void;
  dispose(): void;
}

/**
 * Predicting side of a session: steps owned entities and replicas every
 * tick, submits what they did and applies the server's corrections.
 */
export class RollbackClient {
  readonly scene = new NetworkedScene();
  readonly driver: TickDriver;

  private readonly routes = new Map<string, ClientRoute>();
  private readonly options: RollbackClientOptions;
  private closed = false;

  constructor(
    private readonly transport: IClientTransport,
    options: RollbackClientOptions = {},
  ) {
    this.options = options;
    this.driver = new TickDriver(options.tickRate ?? TICK_RATE);
    this.transport.onMessage((msg) => this.handleMessage(msg));
  }

  /** An entity this client drives with its own input. */
  addOwned<I, S>(
    id: string,
    contract: Authoritative<I, S>,
    codecs: PredictedCodecs<I, S>,
  ): PredictedController<I, S> {
    this.assertFreeId(id);
    const controller = new PredictedController({
      id,
      role: "owner",
      contract,
      inputCodec: codecs.input,
      stateCodec: codecs.state,
      transmit: (tick, payload) => this.submit(id, tick, payload),
      settings: this.controllerSettings(),
      scene: this.scene,
      payloadCapacity: this.options.payloadCapacity,
    });
    this.track(id, controller);
    return controller;
  }

  /** A local replica of an entity the server drives. */
  addReplica<S>(
    id: string,
    contract: ServerDriven<S>,
    codec: PayloadCodec<S>,
  ): ServerDrivenController<S> {
    this.assertFreeId(id);
    const controller = new ServerDrivenController({
      id,
      role: "observer",
      contract,
      stateCodec: codec,
      transmit: (tick, payload) => this.submit(id, tick, payload),
      settings: this.controllerSettings(),
      scene: this.scene,
      payloadCapacity: this.options.payloadCapacity,
    });
    this.track(id, controller);
    return controller;
  }

  remove(id: string): boolean {
    const route = this.routes.get(id);
    if (!route) return false;
    route.dispose();
    return this.routes.delete(id);
  }

  tick(): Tick {
    return this.driver.step();
  }

  start(): void {
    this.driver.start();
  }

  stop(): void {
    this.driver.stop();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.driver.stop();
    for (const route of this.routes.values()) route.dispose();
    this.routes.clear();
    this.scene.clear();
    this.transport.close();
  }

  private track(id: string, controller: TrackedController): void {
    const removeFromDriver = this.driver.add(controller);
    this.routes.set(id, {
      receive: (tick, payload) => controller.receive(tick, payload),
      dispose: () => {
        removeFromDriver();
        controller.dispose();
      },
    });
  }

  private submit(controllerId: string, tick: Tick, payload: Uint8Array): void {
    if (this.closed) return;
    this.transport.send({ type: "submit", controllerId, tick, payload });
  }

  private handleMessage(msg: ServerMessage): void {
    switch (msg.type) {
      case "reconcile": {
        const route = this.routes.get(msg.controllerId);
        if (!route) {
          netLog(`[client] correction for unknown controller ${msg.controllerId} dropped`);
          return;
        }
        route.receive(msg.tick, msg.payload);
        break;
      }
    }
  }

  private controllerSettings(): Partial<ControllerSettings> {
    const settings: Partial<ControllerSettings> = { tickDelta: this.driver.dt };
    if (this.options.historySize !== undefined) settings.historySize = this.options.historySize;
    return settings;
  }

  private assertFreeId(id: string): void {
    if (this.routes.has(id)) {
      throw new Error(`[client] duplicate controller id: ${id}`);
    }
  }
}
