/**
 * The five continuous [0, 1] controls exposed to modes.
 */

export const KNOB_NAMES = ["knob1", "knob2", "knob3", "knob4", "knob5"] as const;

export type KnobName = (typeof KNOB_NAMES)[number];

export type KnobValues = Record<KnobName, number>;

export const DEFAULT_KNOB_VALUE = 0.5;

export class KnobBank {
  private readonly values: number[] = KNOB_NAMES.map(() => DEFAULT_KNOB_VALUE);

  /**
   * Set knob `index` (1..5), clamping `value` to [0, 1].
   *
   * @returns `false` (and changes nothing) for an index outside 1..5 or a
   *   non-finite value.
   */
  set(index: number, value: number): boolean {
    if (!Number.isInteger(index) || index < 1 || index > KNOB_NAMES.length) return false;
    if (typeof value !== "number" || !Number.isFinite(value)) return false;
    this.values[index - 1] = Math.max(0, Math.min(1, value));
    return true;
  }

  get(index: number): number | undefined {
    return this.values[index - 1];
  }

  snapshot(): KnobValues {
    const [knob1, knob2, knob3, knob4, knob5] = this.values;
    return { knob1, knob2, knob3, knob4, knob5 };
  }
}
