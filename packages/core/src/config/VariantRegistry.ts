// packages/core/src/config/VariantRegistry.ts
import type { VariantDescriptor } from "../types/index.js";
import { InvalidKeyScheduleError, VariantError } from "../errors/index.js";

/** Round-key counts of the AES key sizes; nothing else is ever accepted. */
export const SCHEDULE_LENGTHS: readonly number[] = Object.freeze([11, 13, 15]);

export class VariantRegistry {
  private static readonly byId       = new Map<number, VariantDescriptor>();
  private static readonly bySchedule = new Map<number, VariantDescriptor>();
  private static sealed = false;

  static register(v: VariantDescriptor): void {
    if (this.sealed) throw new VariantError(`Registry is sealed; cannot add variant ${v.id}`);
    if (!SCHEDULE_LENGTHS.includes(v.scheduleLength)) {
      throw new VariantError(`Variant ${v.id}: unsupported schedule length ${v.scheduleLength}`);
    }
    if (this.byId.has(v.id)) throw new VariantError(`Variant ${v.id} already registered`);
    if (v.scheduleLength !== v.rounds + 1) {
      throw new VariantError(`Variant ${v.id}: schedule length must be rounds + 1`);
    }
    if (this.bySchedule.has(v.scheduleLength)) {
      throw new VariantError(`Schedule length ${v.scheduleLength} already taken`);
    }
    this.byId.set(v.id, v);
    this.bySchedule.set(v.scheduleLength, v);
  }
  /** Called once the built-in key sizes are in; later registrations throw. */
  static seal(): void { this.sealed = true; }
  static get isSealed(): boolean { return this.sealed; }
  static get(id: number): VariantDescriptor {
    const v = this.byId.get(id);
    if (!v) throw new VariantError(`Unknown variant: ${id}`);
    return v;
  }
  /** Resolve the key size a schedule of `length` round keys belongs to. */
  static forSchedule(length: number): VariantDescriptor {
    const v = SCHEDULE_LENGTHS.includes(length) ? this.bySchedule.get(length) : undefined;
    if (!v) {
      const allowed = SCHEDULE_LENGTHS.join(', ');
      throw new InvalidKeyScheduleError(
        `Key schedule must hold one of {${allowed}} round keys, got ${length}`,
      );
    }
    return v;
  }
  static list(): VariantDescriptor[] {
    return [...this.byId.values()].sort((a, b) => a.id - b.id);
  }
  // default key size
  static get current(): VariantDescriptor { return this.get(128); }
}
