import { BaseRandomSource } from "../src/lib/rng";

/**
 * Replays a fixed list of draws; throws once the script runs out so tests
 * also pin down how many draws a step consumes.
 */
export class ScriptedRandom extends BaseRandomSource {
  private position = 0;

  constructor(private readonly values: readonly number[]) {
    super();
  }

  random(): number {
    if (this.position >= this.values.length) {
      throw new Error(`ScriptedRandom exhausted after ${this.values.length} draws`);
    }
    return this.values[this.position++];
  }

  remaining(): number {
    return this.values.length - this.position;
  }
}
