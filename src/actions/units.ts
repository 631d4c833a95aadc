import table from "./units.json" with { type: "json" };

interface UnitInfo {
  dimension: string;
  /** size of one unit in the dimension's base unit */
  factor: number;
}

const UNITS: ReadonlyMap<string, UnitInfo> = new Map(
  Object.entries(table).flatMap(([dimension, units]) =>
    Object.entries(units).map(
      ([unit, factor]): [string, UnitInfo] => [unit, { dimension, factor }],
    ),
  ),
);

/**
 * Convert between two units of the same dimension. Returns undefined for an
 * unknown unit or a cross-dimension pair.
 */
export function convertUnit(
  value: number,
  from: string,
  to: string,
): number | undefined {
  const a = UNITS.get(from);
  const b = UNITS.get(to);
  if (!a || !b || a.dimension !== b.dimension) return undefined;
  if (from === to) return value;
  return (value * a.factor) / b.factor;
}

