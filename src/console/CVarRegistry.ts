import {
  type BooleanCVarDesc,
  CVar,
  type CVarCategory,
  type CVarDesc,
  type NumberCVarDesc,
} from "./CVar.js";

export type AnyCVar = CVar<number> | CVar<boolean>;

export class CVarRegistry {
  private numbers = new Map<string, CVar<number>>();
  private booleans = new Map<string, CVar<boolean>>();

  register(desc: NumberCVarDesc): CVar<number>;
  register(desc: BooleanCVarDesc): CVar<boolean>;
  register(desc: CVarDesc): AnyCVar {
    if (this.numbers.has(desc.name) || this.booleans.has(desc.name)) {
      throw new Error(`[cvar] duplicate registration: ${desc.name}`);
    }
    if (desc.type === "number") {
      const cv = CVar.number(desc);
      this.numbers.set(desc.name, cv);
      return cv;
    }
    const cv = CVar.boolean(desc);
    this.booleans.set(desc.name, cv);
    return cv;
  }

  get(name: string): AnyCVar | undefined {
    return this.numbers.get(name) ?? this.booleans.get(name);
  }

  getNumber(name: string): CVar<number> | undefined {
    return this.numbers.get(name);
  }

  getBoolean(name: string): CVar<boolean> | undefined {
    return this.booleans.get(name);
  }

  getAll(): AnyCVar[] {
    return [...this.numbers.values(), ...this.booleans.values()].sort((a, b) =>
      a.name.localeCompare(b.name),
    );
  }

  getByCategory(category: CVarCategory): AnyCVar[] {
    return this.getAll().filter((cv) => cv.category === category);
  }

  getNames(): string[] {
    return this.getAll().map((cv) => cv.name);
  }

  resetAll(): void {
    for (const cv of this.getAll()) cv.reset();
  }
}
