import type { NameType, ValueType } from 'recharts/types/component/DefaultTooltipContent';
import type { StressTable } from '../../engine/modules/StressTableModule';

export type StressChartRow = Record<string, number | null>;

/** Series name of one service-life column, e.g. "200k h". */
export function seriesName(hours: number): string {
  return `${(hours / 1000).toFixed(0)}k h`;
}

// One row per tabulated temperature, one series per service-life column.
export function buildChartRows(table: StressTable): StressChartRow[] {
  const { temperatureAxis, durationAxis } = table.describe();
  return temperatureAxis.map(temperature => {
    const row: StressChartRow = { temperature };
    for (const hours of durationAxis) {
      row[seriesName(hours)] = table.cellAt(temperature, hours);
    }
    return row;
  });
}

export function formatStressTooltip(value: ValueType, name: NameType): [string, NameType] {
  return [`${Array.isArray(value) ? value.join('–') : value} MPa`, name];
}

export function formatTemperatureLabel(label: unknown): string {
  return `${String(label)} °C`;
}
