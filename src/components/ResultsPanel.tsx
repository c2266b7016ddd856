/**
 * ResultsPanel – three-tab presentation of one calculation.
 *
 *  Summary: verdict banner and the four key values with their status.
 *  Derivation: the eight steps with substituted formulas.
 *  Chart: allowable stress curves with the design temperature marked.
 *
 * A failed calculation shows only the failure; no partial results.
 */

import { useState } from 'react';
import type { EngineFailure, JointEngineResult } from '../engine/schema/JointInputV1';
import type { JointOutputV1, SummaryStatus, TraceStepV1 } from '../contracts/JointOutputV1';
import { defaultStressTable } from '../engine/modules/StressTableModule';
import AllowableStressCurve from './visualizers/AllowableStressCurve';

// ─── Types ────────────────────────────────────────────────────────────────────

type ResultsTab = 'summary' | 'derivation' | 'chart';

const TAB_LABELS: Record<ResultsTab, string> = {
  summary: 'Summary',
  derivation: 'Derivation',
  chart: 'Allowable stress',
};

const TAB_ORDER: ResultsTab[] = ['summary', 'derivation', 'chart'];

const FAILURE_TITLES: Record<EngineFailure['kind'], string> = {
  input_validation: 'Input data is invalid',
  undeterminable_stress: 'Allowable stress cannot be determined',
  domain_precondition: 'Calculation cannot be completed',
};

// ─── Helpers ──────────────────────────────────────────────────────────────────

function statusColor(status: SummaryStatus): string {
  if (status === 'within limits' || status === 'adequate') return '#276749';
  if (status === 'exceeded' || status === 'insufficient') return '#c53030';
  return '#718096';
}

function FailurePanel({ failure }: { failure: EngineFailure }) {
  return (
    <div className="failure-panel" role="alert">
      <h3>{FAILURE_TITLES[failure.kind]}</h3>
      <p>{failure.message}</p>
      {failure.kind === 'input_validation' && failure.issues.length > 0 && (
        <ul>
          {failure.issues.map((issue, i) => (
            <li key={i}><code>{issue.field}</code>: {issue.message}</li>
          ))}
        </ul>
      )}
      {failure.kind === 'undeterminable_stress' && (
        <p className="failure-hint">
          Check the temperature and the operating hours against the reference table.
        </p>
      )}
    </div>
  );
}

// ─── Tabs ─────────────────────────────────────────────────────────────────────

function SummaryTab({ output }: { output: JointOutputV1 }) {
  const { verdict } = output;
  return (
    <div>
      <div className={`verdict-banner verdict-${verdict.status}`}>
        <strong>{verdict.headline}</strong>
        <span>{verdict.comparison}</span>
      </div>
      <table className="summary-table">
        <thead>
          <tr><th>Parameter</th><th>Value</th><th>Status</th></tr>
        </thead>
        <tbody>
          {output.summary.map(row => (
            <tr key={row.id}>
              <td>{row.label}</td>
              <td className="num">{row.formatted}</td>
              <td style={{ color: statusColor(row.status), fontWeight: 600 }}>{row.status}</td>
            </tr>
          ))}
        </tbody>
      </table>
      {output.notes.length > 0 && (
        <ul className="notes">
          {output.notes.map((note, i) => <li key={i}>{note}</li>)}
        </ul>
      )}
    </div>
  );
}

function TraceStep({ step }: { step: TraceStepV1 }) {
  return (
    <section className="trace-step">
      <h4>{step.step}. {step.title}</h4>
      {step.lines.map((line, i) => <pre key={i} className="formula">{line}</pre>)}
      <p className="trace-headline">{step.headline}</p>
    </section>
  );
}

// ─── Component ────────────────────────────────────────────────────────────────

export default function ResultsPanel({ outcome }: { outcome: JointEngineResult }) {
  const [tab, setTab] = useState<ResultsTab>('summary');

  if (!outcome.ok) return <FailurePanel failure={outcome.failure} />;

  const { engineOutput, input } = outcome;
  return (
    <div className="results-panel">
      <div className="tabs">
        {TAB_ORDER.map(t => (
          <button key={t} className={t === tab ? 'tab active' : 'tab'} onClick={() => setTab(t)}>
            {TAB_LABELS[t]}
          </button>
        ))}
      </div>

      {tab === 'summary' && <SummaryTab output={engineOutput} />}
      {tab === 'derivation' && (
        <div>
          {engineOutput.trace.map(step => <TraceStep key={step.step} step={step} />)}
        </div>
      )}
      {tab === 'chart' && (
        <div className="chart-box">
          <AllowableStressCurve table={defaultStressTable} temperature={input.temperature} />
        </div>
      )}

      <p className="results-meta">
        {engineOutput.meta.designCode} · steel {engineOutput.meta.material} · engine v{engineOutput.meta.engineVersion}
      </p>
    </div>
  );
}
