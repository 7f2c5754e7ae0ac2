// splitmix64 deterministic RNG; one stream per session (seed + cursor)

import { Injectable } from '@nestjs/common';

export interface RngState {
  seed: string;
  cursor: number;
}

const MASK_64 = 0xffffffffffffffffn;

export class Rng {
  private state: bigint;
  private _cursor: number;
  private _consumed: number;

  constructor(
    private readonly seed: string,
    cursor: number = 0,
  ) {
    this.state = this.hashSeed(seed);
    this._cursor = cursor;
    this._consumed = 0;
    // fast-forward state only; cursor/consumed stay as given
    for (let i = 0; i < cursor; i++) {
      this.advanceState();
    }
  }

  private hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK_64;
    }
    return h === 0n ? 1n : h;
  }

  private advanceState(): void {
    this.state = (this.state + 0x9e3779b97f4a7c15n) & MASK_64;
  }

  private nextRaw(): bigint {
    this._cursor++;
    this._consumed++;
    this.advanceState();
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
    return (z ^ (z >> 31n)) & MASK_64;
  }

  /** Uniform float in [0, 1) */
  next(): number {
    // 53 high bits keep the result strictly below 1
    return Number(this.nextRaw() >> 11n) / 2 ** 53;
  }

  /** Integer in [min, max] inclusive */
  range(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** true with the given probability (0..1) */
  roll(probability: number): boolean {
    return this.next() < probability;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Rng.pick called with an empty list');
    }
    return items[this.range(0, items.length - 1)];
  }

  /** 8 hex chars, for ids that must replay with the session */
  token(): string {
    return (this.nextRaw() & 0xffffffffn).toString(16).padStart(8, '0');
  }

  getState(): RngState {
    return { seed: this.seed, cursor: this._cursor };
  }

  get cursor(): number {
    return this._cursor;
  }

  get consumed(): number {
    return this._consumed;
  }
}

@Injectable()
export class RngService {
  create(seed: string, cursor: number = 0): Rng {
    return new Rng(seed, cursor);
  }
}
