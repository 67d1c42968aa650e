import { serverLogError } from "../server/serverLog.js";

export type CVarCategory = "net" | "sv";

export interface CVarDesc {
  name: string;
  description: string;
  defaultValue: number;
  min?: number;
  max?: number;
  /** Round input to a whole number before clamping. */
  integer?: boolean;
  category: CVarCategory;
}

/** Numeric console variable. Input is clamped to [min, max]; listeners see every change. */
export class CVar {
  readonly name: string;
  readonly description: string;
  readonly defaultValue: number;
  readonly min: number | undefined;
  readonly max: number | undefined;
  readonly integer: boolean;
  readonly category: CVarCategory;
  private value: number;
  private listeners = new Set<(newVal: number, oldVal: number) => void>();

  constructor(desc: CVarDesc) {
    this.name = desc.name;
    this.description = desc.description;
    this.defaultValue = desc.defaultValue;
    this.min = desc.min;
    this.max = desc.max;
    this.integer = desc.integer ?? false;
    this.category = desc.category;
    this.value = desc.defaultValue;
  }

  get(): number {
    return this.value;
  }

  set(raw: number): void {
    if (Number.isNaN(raw)) return;
    let v = this.integer ? Math.round(raw) : raw;
    if (this.min != null) v = Math.max(this.min, v);
    if (this.max != null) v = Math.min(this.max, v);
    if (v === this.value) return;
    const old = this.value;
    this.value = v;
    for (const cb of this.listeners) {
      try {
        cb(v, old);
      } catch (e) {
        serverLogError(`[cvar] onChange error for ${this.name}`, e);
      }
    }
  }

  reset(): void {
    this.set(this.defaultValue);
  }

  onChange(cb: (newVal: number, oldVal: number) => void): () => void {
    this.listeners.add(cb);
    return () => this.listeners.delete(cb);
  }

  /** Parse console input and set it. Returns false when the input is not a number. */
  setFromString(str: string): boolean {
    const n = Number(str.trim());
    if (str.trim() === "" || Number.isNaN(n)) return false;
    this.set(n);
    return true;
  }

  toString(): string {
    return `${this.name} = ${this.value} (default: ${this.defaultValue}) -- ${this.description}`;
  }
}
