import type { JointInputV1 } from '../engine/schema/JointInputV1';

interface Props {
  value: JointInputV1;
  onChange: (next: JointInputV1) => void;
  onSubmit: () => void;
}

interface FieldSpec {
  key: keyof JointInputV1;
  label: string;
  unit: string;
  step: number;
  help?: string;
}

const MAIN_FIELDS: FieldSpec[] = [
  { key: 'outerDiameterMain', label: 'Main pipe (header) outer diameter D_a', unit: 'mm', step: 1 },
  { key: 'wallThicknessMain', label: 'Main pipe wall thickness s', unit: 'mm', step: 0.1 },
  { key: 'outerDiameterBranch', label: 'Branch outer diameter d_a', unit: 'mm', step: 1 },
  { key: 'wallThicknessBranch', label: 'Branch wall thickness s_s', unit: 'mm', step: 0.1 },
  { key: 'pressure', label: 'Pressure p', unit: 'MPa', step: 0.1 },
  { key: 'temperature', label: 'Temperature T', unit: '°C', step: 1 },
  { key: 'elapsedHours', label: 'Operating hours at inspection', unit: 'h', step: 1000 },
  { key: 'plannedHours', label: 'Planned further operation', unit: 'h', step: 1000 },
];

const EXTRA_FIELDS: FieldSpec[] = [
  {
    key: 'corrosionAllowance',
    label: 'Corrosion allowance c',
    unit: 'mm',
    step: 0.1,
    help: 'Usually 0–2 mm depending on how aggressive the medium is.',
  },
];

export default function JointInputForm({ value, onChange, onSubmit }: Props) {
  function renderField(field: FieldSpec) {
    return (
      <label key={field.key} className="field">
        <span className="field-label">{field.label}, {field.unit}</span>
        <input
          type="number"
          min={0}
          step={field.step}
          value={Number.isNaN(value[field.key]) ? '' : value[field.key]}
          // An empty box becomes NaN; the engine reports it as invalid input.
          onChange={e => onChange({ ...value, [field.key]: e.target.value === '' ? Number.NaN : Number(e.target.value) })}
        />
        {field.help && <small className="field-help">{field.help}</small>}
      </label>
    );
  }

  return (
    <form
      className="joint-form"
      onSubmit={e => {
        e.preventDefault();
        onSubmit();
      }}
    >
      <h2>Input data</h2>
      {MAIN_FIELDS.map(renderField)}
      <h3>Additional parameters</h3>
      {EXTRA_FIELDS.map(renderField)}
      <button type="submit" className="cta-btn">Calculate</button>

      <dl className="legend">
        <dt>D_a</dt><dd>outer diameter of the main pipe</dd>
        <dt>s</dt><dd>wall thickness of the main pipe</dd>
        <dt>d_a</dt><dd>outer diameter of the branch</dd>
        <dt>s_s</dt><dd>wall thickness of the branch</dd>
        <dt>s_os</dt><dd>minimum wall thickness of the branch</dd>
        <dt>c</dt><dd>corrosion allowance</dd>
      </dl>
    </form>
  );
}
