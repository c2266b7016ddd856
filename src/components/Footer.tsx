import { ENGINE_VERSION, DESIGN_CODE } from '../contracts/versions';

type FooterPage = 'calculator' | 'table' | 'methodology';

export default function Footer({ onNavigate }: { onNavigate: (page: FooterPage) => void }) {
  return (
    <footer className="site-footer">
      <nav className="footer-links">
        <button className="footer-link" onClick={() => onNavigate('methodology')}>Methodology</button>
        <button className="footer-link" onClick={() => onNavigate('table')}>Reference table</button>
      </nav>
      <p className="footer-meta">
        Calculated to {DESIGN_CODE} “Strength calculation standards for stationary boilers and
        steam and hot-water pipelines” &nbsp;·&nbsp; Engine v{ENGINE_VERSION}
      </p>
    </footer>
  );
}
