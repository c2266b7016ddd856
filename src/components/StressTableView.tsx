import { defaultStressTable } from '../engine/modules/StressTableModule';
import AllowableStressCurve from './visualizers/AllowableStressCurve';

/** Reference table of allowable stresses as tabulated, with gaps shown as "–". */
export default function StressTableView() {
  const table = defaultStressTable;
  const { material, standard, temperatureAxis, durationAxis, presentPoints } = table.describe();

  return (
    <div className="stress-table-view">
      <h2>Allowable stress [σ], MPa: steel {material}</h2>
      <p className="subtitle">
        {standard}. {presentPoints} tabulated values. Intermediate points are interpolated
        linearly; combinations outside the tabulated region are not determined.
      </p>

      <div className="table-scroll">
        <table className="stress-table">
          <thead>
            <tr>
              <th>Hours \ T, °C</th>
              {temperatureAxis.map(t => <th key={t}>{t}</th>)}
            </tr>
          </thead>
          <tbody>
            {durationAxis.map(hours => (
              <tr key={hours}>
                <th>{hours.toLocaleString('en-US')}</th>
                {temperatureAxis.map(t => {
                  const cell = table.cellAt(t, hours);
                  return <td key={t} className={cell === null ? 'empty' : 'num'}>{cell ?? '–'}</td>;
                })}
              </tr>
            ))}
          </tbody>
        </table>
      </div>

      <div className="chart-box">
        <AllowableStressCurve table={table} />
      </div>
    </div>
  );
}
