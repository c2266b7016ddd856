/**
 * StressTableModule: allowable stress [σ] by temperature and cumulative
 * operating hours.
 *
 * Data source: src/data/stress-12kh1mf.json (12Kh1MF, RD 10-249-98).
 * The table is sparse: the code only tabulates [σ] where the steel is
 * qualified for that temperature / service-life pair. Queries are answered by
 * piecewise-linear interpolation over a Delaunay triangulation of the present
 * cells and return null outside their convex hull. No extrapolation.
 */

import { z } from 'zod';
import stressData from '../../data/stress-12kh1mf.json';
import { interpolateLinear, triangulate } from '../utils/triangulation';
import type { Triangulation } from '../utils/triangulation';

export interface AllowableStressTableData {
  material: string;
  standard: string;
  /** Ascending temperatures (°C). */
  temperatureAxis: number[];
  /** Ascending cumulative-hour checkpoints. */
  durationAxis: number[];
  /** One row per duration; one cell per temperature; null where not tabulated (MPa). */
  rows: (number | null)[][];
}

export interface StressPoint {
  temperature: number;
  hours: number;
  stress: number;
}

export interface StressTableSummary {
  material: string;
  standard: string;
  temperatureAxis: readonly number[];
  durationAxis: readonly number[];
  presentPoints: number;
  temperatureRange: [number, number] | null;
  durationRange: [number, number] | null;
}

export interface StressTable {
  /** Interpolated [σ] (MPa), or null when it cannot be determined. */
  query(temperature: number, totalHours: number): number | null;
  /** Tabulated value at an axis pair, or null when absent or off-axis. */
  cellAt(temperature: number, hours: number): number | null;
  /** Present cells in table order (durations outer, temperatures inner). */
  points(): readonly StressPoint[];
  describe(): StressTableSummary;
}

function strictlyAscending(axis: number[]): boolean {
  return axis.every((v, i) => i === 0 || v > axis[i - 1]);
}

const TableDataSchema = z
  .object({
    material: z.string().min(1),
    standard: z.string().min(1),
    temperatureAxis: z.array(z.number().finite()).min(1),
    durationAxis: z.array(z.number().finite().nonnegative()).min(1),
    rows: z.array(z.array(z.number().finite().positive().nullable())),
  })
  .refine(d => strictlyAscending(d.temperatureAxis), {
    message: 'temperatureAxis must be strictly ascending',
    path: ['temperatureAxis'],
  })
  .refine(d => strictlyAscending(d.durationAxis), {
    message: 'durationAxis must be strictly ascending',
    path: ['durationAxis'],
  })
  .refine(d => d.rows.length === d.durationAxis.length, {
    message: 'rows must have one entry per duration',
    path: ['rows'],
  })
  .refine(d => d.rows.every(r => r.length === d.temperatureAxis.length), {
    message: 'every row must have one cell per temperature',
    path: ['rows'],
  });

function range(values: number[]): [number, number] | null {
  if (values.length === 0) return null;
  return [Math.min(...values), Math.max(...values)];
}

/**
 * Build a read-only stress table. Throws when the reference data is malformed;
 * this happens once at module load, never per query.
 */
export function buildStressTable(data: AllowableStressTableData): StressTable {
  const parsed = TableDataSchema.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid allowable stress table (${data.material}): ${detail}`);
  }

  const temperatureAxis = Object.freeze([...data.temperatureAxis]);
  const durationAxis = Object.freeze([...data.durationAxis]);
  const rows = Object.freeze(data.rows.map(r => Object.freeze([...r])));

  const present: StressPoint[] = [];
  rows.forEach((row, d) => {
    row.forEach((stress, t) => {
      if (stress !== null) {
        present.push({ temperature: temperatureAxis[t], hours: durationAxis[d], stress });
      }
    });
  });
  const points = Object.freeze(present.map(p => Object.freeze(p)));

  const triangulation: Triangulation = triangulate(points.map(p => ({ x: p.temperature, y: p.hours })));
  const values = points.map(p => p.stress);

  return Object.freeze({
    query(temperature: number, totalHours: number): number | null {
      if (triangulation.triangles.length === 0) return null;
      try {
        return interpolateLinear(triangulation, values, temperature, totalHours);
      } catch {
        // A fault inside the interpolation means "cannot determine"; only buildStressTable throws.
        return null;
      }
    },

    cellAt(temperature: number, hours: number): number | null {
      const t = temperatureAxis.indexOf(temperature);
      const d = durationAxis.indexOf(hours);
      if (t < 0 || d < 0) return null;
      return rows[d][t];
    },

    points(): readonly StressPoint[] {
      return points;
    },

    describe(): StressTableSummary {
      return {
        material: data.material,
        standard: data.standard,
        temperatureAxis,
        durationAxis,
        presentPoints: points.length,
        temperatureRange: range(points.map(p => p.temperature)),
        durationRange: range(points.map(p => p.hours)),
      };
    },
  });
}

/** The 12Kh1MF reference table, built once and shared by every calculation. */
export const defaultStressTable: StressTable = buildStressTable(stressData);
