import { CVarRegistry } from "../console/CVarRegistry.js";
import { type ServerCVars, registerServerCVars } from "../console/serverCVarDefs.js";
import { TickDriver } from "../core/TickDriver.js";
import type { Tick } from "../history/History.js";
import type { Authoritative, ServerDriven } from "../rollback/Authoritative.js";
import { type CatchUpSettings, validateCatchUpSettings } from "../rollback/CatchUpPolicy.js";
import { NetworkedScene } from "../rollback/NetworkedScene.js";
import { PredictedController } from "../rollback/PredictedController.js";
import type { ControllerSettings } from "../rollback/RollbackController.js";
import { ServerDrivenController } from "../rollback/ServerDrivenController.js";
import { netLog, netLogError } from "../shared/netLog.js";
import type { PayloadCodec } from "../shared/payloadCodec.js";
import type { ClientMessage } from "../shared/protocol.js";
import type { IServerTransport } from "../transport/Transport.js";

export interface PredictedCodecs<I, S> {
  input: PayloadCodec<I>;
  state: PayloadCodec<S>;
}

export interface RollbackServerOptions {
  /** Registry to put the server cvars in. A private one is created otherwise. */
  registry?: CVarRegistry;
  /** Scratch capacity for each controller's payload writer. */
  payloadCapacity?: number;
}

/** What the server needs from a controller, independent of its I/S types. */
interface ServerRoute {
  /** Owning connection for predicted controllers; null for server-driven ones. */
  ownerId: string | null;
  receive(clientId: string, tick: Tick, payload: Uint8Array): void;
  forget(clientId: string): void;
  applyCatchUp(minBuffer: number, maxBuffer: number): void;
  dispose(): void;
}

/**
 * Authoritative side of a session: owns the tick driver, the networked
 * scene and one controller per entity, and routes client submissions to
 * them.
 */
export class RollbackServer {
  readonly scene = new NetworkedScene();
  readonly driver: TickDriver;
  readonly registry: CVarRegistry;
  readonly cvars: ServerCVars;

  private readonly routes = new Map<string, ServerRoute>();
  private readonly clients = new Set<string>();
  private readonly unsubscribers: (() => void)[] = [];
  private readonly payloadCapacity: number | undefined;
  private closed = false;
  /** Last catch-up pair that validated. */
  private catchUp: CatchUpSettings;

  constructor(
    private readonly transport: IServerTransport,
    options: RollbackServerOptions = {},
  ) {
    this.registry = options.registry ?? new CVarRegistry();
    this.cvars = registerServerCVars(this.registry);
    this.payloadCapacity = options.payloadCapacity;
    this.driver = new TickDriver(this.cvars.sv_tickrate.get());
    this.catchUp = validateCatchUpSettings({
      minBuffer: this.cvars.sv_minbuffer.get(),
      maxBuffer: this.cvars.sv_maxbuffer.get(),
    });

    this.unsubscribers.push(
      this.cvars.sv_tickrate.onChange((hz) => this.driver.setTickRate(hz)),
      this.cvars.sv_minbuffer.onChange(() => this.pushCatchUpSettings()),
      this.cvars.sv_maxbuffer.onChange(() => this.pushCatchUpSettings()),
    );

    this.transport.onMessage((clientId, msg) => this.handleMessage(clientId, msg));
    this.transport.onConnect((clientId) => {
      this.clients.add(clientId);
      netLog(`[server] client ${clientId} connected`);
    });
    this.transport.onDisconnect((clientId) => {
      this.clients.delete(clientId);
      for (const route of this.routes.values()) route.forget(clientId);
      netLog(`[server] client ${clientId} disconnected`);
    });
  }

  get connectedClients(): string[] {
    return [...this.clients];
  }

  /** Authority for an entity predicted by `ownerId`. */
  addPredicted<I, S>(
    id: string,
    ownerId: string,
    contract: Authoritative<I, S>,
    codecs: PredictedCodecs<I, S>,
  ): PredictedController<I, S> {
    this.assertFreeId(id);
    const controller = new PredictedController({
      id,
      role: "authority",
      contract,
      inputCodec: codecs.input,
      stateCodec: codecs.state,
      transmit: (tick, payload) =>
        this.transport.send(ownerId, { type: "reconcile", controllerId: id, tick, payload }),
      settings: this.controllerSettings(),
      scene: this.scene,
      payloadCapacity: this.payloadCapacity,
    });
    const removeFromDriver = this.driver.add(controller);

    this.routes.set(id, {
      ownerId,
      receive: (clientId, tick, payload) => {
        if (clientId !== ownerId) {
          netLog(`[server] submission for ${id} from non-owner ${clientId} rejected`);
          return;
        }
        controller.receive(tick, payload);
      },
      forget: () => {},
      applyCatchUp: (minBuffer, maxBuffer) => controller.updateSettings({ minBuffer, maxBuffer }),
      dispose: () => {
        removeFromDriver();
        controller.dispose();
      },
    });
    return controller;
  }

  /** Authority for an entity only the server drives; every client replicates it. */
  addServerDriven<S>(
    id: string,
    contract: ServerDriven<S>,
    codec: PayloadCodec<S>,
  ): ServerDrivenController<S> {
    this.assertFreeId(id);
    const controller = new ServerDrivenController({
      id,
      role: "authority",
      contract,
      stateCodec: codec,
      transmit: (tick, payload, connectionId) => {
        if (connectionId === undefined) return;
        this.transport.send(connectionId, { type: "reconcile", controllerId: id, tick, payload });
      },
      settings: this.controllerSettings(),
      scene: this.scene,
      payloadCapacity: this.payloadCapacity,
    });
    const removeFromDriver = this.driver.add(controller);

    this.routes.set(id, {
      ownerId: null,
      receive: (clientId, tick, payload) => controller.receive(tick, payload, clientId),
      forget: (clientId) => {
        controller.forgetConnection(clientId);
      },
      applyCatchUp: () => {},
      dispose: () => {
        removeFromDriver();
        controller.dispose();
      },
    });
    return controller;
  }

  /** Dispose the controller registered as `id`. */
  remove(id: string): boolean {
    const route = this.routes.get(id);
    if (!route) return false;
    route.dispose();
    return this.routes.delete(id);
  }

  /** Run one tick. */
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
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    for (const route of this.routes.values()) route.dispose();
    this.routes.clear();
    this.scene.clear();
    this.transport.close();
  }

  private handleMessage(clientId: string, msg: ClientMessage): void {
    switch (msg.type) {
      case "submit": {
        const route = this.routes.get(msg.controllerId);
        if (!route) {
          netLog(`[server] submission for unknown controller ${msg.controllerId} from ${clientId} dropped`);
          return;
        }
        route.receive(clientId, msg.tick, msg.payload);
        break;
      }
    }
  }

  private controllerSettings(): Partial<ControllerSettings> {
    return {
      ...this.catchUp,
      historySize: this.cvars.net_history.get(),
      tickDelta: this.driver.dt,
    };
  }

  /**
   * Apply sv_minbuffer / sv_maxbuffer to every live controller. A pair that
   * doesn't validate puts both cvars back to the last applied pair.
   */
  private pushCatchUpSettings(): void {
    const requested: CatchUpSettings = {
      minBuffer: this.cvars.sv_minbuffer.get(),
      maxBuffer: this.cvars.sv_maxbuffer.get(),
    };
    try {
      validateCatchUpSettings(requested);
    } catch (err) {
      this.cvars.sv_minbuffer.set(this.catchUp.minBuffer);
      this.cvars.sv_maxbuffer.set(this.catchUp.maxBuffer);
      netLogError(
        `[server] catch-up settings min=${requested.minBuffer} max=${requested.maxBuffer} not applied`,
        err,
      );
      return;
    }
    this.catchUp = requested;
    for (const route of this.routes.values()) {
      route.applyCatchUp(requested.minBuffer, requested.maxBuffer);
    }
  }

  private assertFreeId(id: string): void {
    if (this.routes.has(id)) {
      throw new Error(`[server] duplicate controller id: ${id}`);
    }
  }
}
