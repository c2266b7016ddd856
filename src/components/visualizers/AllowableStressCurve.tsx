import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
  ReferenceLine,
} from 'recharts';
import type { StressTable } from '../../engine/modules/StressTableModule';
import { buildChartRows, formatStressTooltip, formatTemperatureLabel, seriesName } from './stressChartData';

const LINE_COLOURS = ['#3182ce', '#38a169', '#ed8936', '#805ad5', '#e53e3e'];

interface Props {
  table: StressTable;
  /** Design temperature of the current calculation, marked on the chart. */
  temperature?: number;
}

export default function AllowableStressCurve({ table, temperature }: Props) {
  const data = buildChartRows(table);
  const { durationAxis } = table.describe();

  return (
    <ResponsiveContainer width="100%" height="100%">
      <LineChart data={data} margin={{ top: 5, right: 20, left: 0, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis
          dataKey="temperature"
          type="number"
          domain={['dataMin', 'dataMax']}
          tick={{ fontSize: 10 }}
          label={{ value: 'Temperature, °C', position: 'insideBottom', offset: -2, fontSize: 11 }}
        />
        <YAxis
          tick={{ fontSize: 10 }}
          label={{ value: '[σ], MPa', angle: -90, position: 'insideLeft', fontSize: 11 }}
        />
        <Tooltip
          contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }}
          formatter={formatStressTooltip}
          labelFormatter={formatTemperatureLabel}
        />
        <Legend wrapperStyle={{ fontSize: '0.8rem', paddingTop: '8px' }} />
        {temperature !== undefined && (
          <ReferenceLine
            x={temperature}
            stroke="#e53e3e"
            strokeDasharray="4 4"
            label={{ value: `T = ${temperature} °C`, fontSize: 10, fill: '#e53e3e' }}
          />
        )}
        {durationAxis.map((hours, i) => (
          <Line
            key={hours}
            type="linear"
            dataKey={seriesName(hours)}
            stroke={LINE_COLOURS[i % LINE_COLOURS.length]}
            strokeWidth={2}
            dot={{ r: 2 }}
            connectNulls={false}
          />
        ))}
      </LineChart>
    </ResponsiveContainer>
  );
}
