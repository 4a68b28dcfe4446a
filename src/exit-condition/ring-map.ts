import type { Logger } from '../core/logging/index.js';
import {
  DEFAULT_MAP_GLYPHS,
  DEFAULT_MAP_GROWTH_STEP,
  DEFAULT_MAP_INITIAL_CEILING,
  DEFAULT_MAP_MAX_CAPACITY,
  type MapGlyphs,
} from './types.js';

/** Marks a slot that has not been written since it was allocated. */
const EMPTY_SLOT = '';

export interface RingMapOptions {
  readonly maxCapacity?: number;
  readonly glyphs?: MapGlyphs;
  /** Upper bound for the first allocation */
  readonly initialCeiling?: number;
  readonly growthStep?: number;
  readonly logger?: Logger;
  /** Storage allocator; throwing RangeError stops further growth. */
  readonly allocate?: (size: number) => string[];
}

export interface RingMapState {
  readonly capacity: number;
  readonly maxCapacity: number;
  readonly writePos: number;
  readonly hasWrapped: boolean;
  /** False once the first allocation failed and recording was given up. */
  readonly enabled: boolean;
}

function allocateSlots(size: number): string[] {
  return new Array<string>(size).fill(EMPTY_SLOT);
}

/**
 * Bounded, lazily-growing circular log of probe outcomes.
 *
 * Storage starts at min(maxCapacity, initialCeiling) on the first record and
 * grows by growthStep while full and below maxCapacity. At maxCapacity the
 * next write goes to index 0 and the oldest entries are overwritten.
 *
 * Whether the buffer has wrapped is read from the last slot: it is only
 * written once the write position has passed through it since the last
 * allocation. When it is set and writePos < capacity, writePos is the start
 * of the oldest entry; otherwise writePos is the end of valid data.
 */
export class RingMap {
  readonly glyphs: MapGlyphs;
  private maxCapacity: number;
  private readonly initialCeiling: number;
  private readonly growthStep: number;
  private readonly logger?: Logger;
  private readonly allocate: (size: number) => string[];

  private slots: string[] | null = null;
  private writePos = 0;
  private enabled = true;

  constructor(options: RingMapOptions = {}) {
    this.maxCapacity = options.maxCapacity ?? DEFAULT_MAP_MAX_CAPACITY;
    this.glyphs = options.glyphs ?? DEFAULT_MAP_GLYPHS;
    this.initialCeiling = options.initialCeiling ?? DEFAULT_MAP_INITIAL_CEILING;
    this.growthStep = options.growthStep ?? DEFAULT_MAP_GROWTH_STEP;
    this.logger = options.logger;
    this.allocate = options.allocate ?? allocateSlots;

    if (!Number.isSafeInteger(this.maxCapacity) || this.maxCapacity < 1) {
      throw new RangeError(`RingMap maxCapacity must be a positive integer, got ${this.maxCapacity}`);
    }
    if (this.initialCeiling < 1 || this.growthStep < 1) {
      throw new RangeError('RingMap initialCeiling and growthStep must be positive');
    }
  }

  get capacity(): number {
    return this.slots?.length ?? 0;
  }

  /** True once the last slot has been written since the last allocation. */
  get hasWrapped(): boolean {
    const slots = this.slots;
    if (slots === null) return false;
    return slots[slots.length - 1] !== EMPTY_SLOT;
  }

  state(): RingMapState {
    return {
      capacity: this.capacity,
      maxCapacity: this.maxCapacity,
      writePos: this.writePos,
      hasWrapped: this.hasWrapped,
      enabled: this.enabled,
    };
  }

  /** Append one outcome glyph. */
  record(isSuccess: boolean): void {
    if (!this.enabled) return;

    if (this.slots === null) {
      this.slots = this.initialAllocation();
      if (this.slots === null) return;
    }

    const glyph = isSuccess ? this.glyphs.success : this.glyphs.failure;
    let pos = this.writePos;

    if (pos === this.slots.length) {
      this.slots = this.extend(this.slots);
      if (pos === this.slots.length) pos = 0;
    }

    this.slots[pos] = glyph;
    this.writePos = pos + 1;
  }

  /** Logical contents, oldest to newest. Does not touch stored slots. */
  render(): string {
    const slots = this.slots;
    if (slots === null) return '';

    if (this.hasWrapped && this.writePos < slots.length) {
      return slots.slice(this.writePos).join('') + slots.slice(0, this.writePos).join('');
    }
    return slots.slice(0, this.writePos).join('');
  }

  /**
   * Physical buffer with unwritten slots as spaces, and a caret under the
   * current write position on the second line.
   */
  renderDebug(): string {
    const slots = this.slots ?? [];
    const physical = slots.map((slot) => (slot === EMPTY_SLOT ? ' ' : slot)).join('');
    return `${physical}\n${' '.repeat(this.writePos)}^`;
  }

  private initialAllocation(): string[] | null {
    const size = Math.min(this.maxCapacity, this.initialCeiling);
    try {
      const slots = this.allocate(size);
      this.logger?.debug({ capacity: size, maxCapacity: this.maxCapacity }, 'Allocated outcome map');
      return slots;
    } catch (e) {
      if (!(e instanceof RangeError)) throw e;
      this.enabled = false;
      this.logger?.warn({ err: e, capacity: size }, 'Outcome map allocation failed, map recording disabled');
      return null;
    }
  }

  private extend(current: string[]): string[] {
    if (current.length >= this.maxCapacity) return current;

    const size = Math.min(current.length + this.growthStep, this.maxCapacity);
    let next: string[];
    try {
      next = this.allocate(size);
    } catch (e) {
      if (!(e instanceof RangeError)) throw e;
      this.logger?.warn(
        { err: e, capacity: current.length, requested: size },
        'Outcome map growth failed, keeping current capacity'
      );
      this.maxCapacity = current.length;
      return current;
    }

    for (let i = 0; i < current.length; i++) next[i] = current[i] ?? EMPTY_SLOT;
    this.logger?.debug({ from: current.length, to: size, maxCapacity: this.maxCapacity }, 'Extended outcome map');
    return next;
  }
}
