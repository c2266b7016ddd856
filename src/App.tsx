import { useState } from 'react';
import JointInputForm from './components/JointInputForm';
import ResultsPanel from './components/ResultsPanel';
import StressTableView from './components/StressTableView';
import Footer from './components/Footer';
import MethodologyPage from './components/governance/MethodologyPage';
import { runEngine } from './engine/Engine';
import { DEFAULT_JOINT_INPUT } from './engine/schema/JointInputV1';
import type { JointEngineResult, JointInputV1 } from './engine/schema/JointInputV1';
import './App.css';

type Page = 'calculator' | 'table' | 'methodology';

export default function App() {
  const [page, setPage] = useState<Page>('calculator');
  const [input, setInput] = useState<JointInputV1>(DEFAULT_JOINT_INPUT);
  const [outcome, setOutcome] = useState<JointEngineResult | null>(null);

  function handleCalculate() {
    setOutcome(runEngine(input));
  }

  if (page === 'methodology') return <MethodologyPage onBack={() => setPage('calculator')} />;

  return (
    <div className="app">
      <header className="hero">
        <h1>Welded Branch Joint Strength Check</h1>
        <p className="subtitle">Header-to-stub joints under internal pressure · RD 10-249-98</p>
        <nav className="tabs">
          <button
            className={page === 'calculator' ? 'tab active' : 'tab'}
            onClick={() => setPage('calculator')}
          >
            Calculation
          </button>
          <button
            className={page === 'table' ? 'tab active' : 'tab'}
            onClick={() => setPage('table')}
          >
            Allowable stress table
          </button>
        </nav>
      </header>

      {page === 'table' ? (
        <StressTableView />
      ) : (
        <div className="workspace">
          <aside className="sidebar">
            <JointInputForm value={input} onChange={setInput} onSubmit={handleCalculate} />
          </aside>
          <main className="results">
            {outcome
              ? <ResultsPanel outcome={outcome} />
              : <p className="hint">Enter the joint data in the side panel and press “Calculate”.</p>}
          </main>
        </div>
      )}

      <Footer onNavigate={setPage} />
    </div>
  );
}
