import { netLogError } from "../shared/netLog.js";

export type CVarValue = number | boolean;
export type CVarType = "number" | "boolean";
export type CVarCategory = "cl" | "sv" | "net";

interface CVarDescBase {
  name: string;
  description: string;
  category: CVarCategory;
}

export interface NumberCVarDesc extends CVarDescBase {
  type: "number";
  defaultValue: number;
  min?: number;
  max?: number;
  /** Round assigned values to the nearest integer. */
  integer?: boolean;
}

export interface BooleanCVarDesc extends CVarDescBase {
  type: "boolean";
  defaultValue: boolean;
}

export type CVarDesc = NumberCVarDesc | BooleanCVarDesc;

/** Value handling that differs per CVar type. */
interface CVarKind<T extends CVarValue> {
  normalize(raw: T): T;
  parse(str: string): T | undefined;
}

export class CVar<T extends CVarValue> {
  readonly name: string;
  readonly description: string;
  readonly type: CVarType;
  readonly defaultValue: T;
  readonly min: number | undefined;
  readonly max: number | undefined;
  readonly category: CVarCategory;
  private value: T;
  private readonly kind: CVarKind<T>;
  private listeners = new Set<(newVal: T, oldVal: T) => void>();

  static number(desc: NumberCVarDesc): CVar<number> {
    const { min, max, integer } = desc;
    return new CVar<number>(desc, desc.defaultValue, min, max, {
      normalize(raw) {
        let v = integer ? Math.round(raw) : raw;
        if (min != null) v = Math.max(min, v);
        if (max != null) v = Math.min(max, v);
        return v;
      },
      parse(str) {
        const n = Number(str);
        return str.trim() === "" || Number.isNaN(n) ? undefined : n;
      },
    });
  }

  static boolean(desc: BooleanCVarDesc): CVar<boolean> {
    return new CVar<boolean>(desc, desc.defaultValue, undefined, undefined, {
      normalize: (raw) => raw,
      parse(str) {
        if (str === "1" || str === "true") return true;
        if (str === "0" || str === "false") return false;
        return undefined;
      },
    });
  }

  private constructor(
    desc: CVarDesc,
    defaultValue: T,
    min: number | undefined,
    max: number | undefined,
    kind: CVarKind<T>,
  ) {
    this.name = desc.name;
    this.description = desc.description;
    this.type = desc.type;
    this.category = desc.category;
    this.min = min;
    this.max = max;
    this.kind = kind;
    this.defaultValue = defaultValue;
    this.value = defaultValue;
  }

  get(): T {
    return this.value;
  }

  set(raw: T): void {
    const v = this.kind.normalize(raw);
    if (v === this.value) return;
    const old = this.value;
    this.value = v;
    for (const cb of this.listeners) {
      try {
        cb(v, old);
      } catch (e) {
        netLogError(`[cvar] onChange error for ${this.name}`, e);
      }
    }
  }

  reset(): void {
    this.set(this.defaultValue);
  }

  onChange(cb: (newVal: T, oldVal: T) => void): () => void {
    this.listeners.add(cb);
    return () => this.listeners.delete(cb);
  }

  /** Parse a string value into the correct type and set it. Returns false if unparseable. */
  setFromString(str: string): boolean {
    const parsed = this.kind.parse(str);
    if (parsed === undefined) return false;
    this.set(parsed);
    return true;
  }

  toString(): string {
    return `${this.name} = ${String(this.value)} (default: ${String(this.defaultValue)}) -- ${this.description}`;
  }
}
