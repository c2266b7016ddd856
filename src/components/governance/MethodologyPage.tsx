export default function MethodologyPage({ onBack }: { onBack: () => void }) {
  return (
    <div className="governance-page">
      <div className="page-header">
        <button className="back-btn" onClick={onBack}>← Back</button>
        <span className="step-label">Methodology</span>
      </div>

      <div className="governance-content">
        <h1>Calculation method</h1>
        <p className="governance-lead">
          Strength check of a welded branch in a header under internal pressure, following
          RD 10-249-98. Linear dimensions in mm, pressure and stress in MPa.
        </p>

        <h2>1. Allowable stress [σ]</h2>
        <ul>
          <li>Taken from the 12Kh1MF table at the design temperature T and the total service life (hours at inspection + planned hours)</li>
          <li>Between tabulated points the value is interpolated linearly over a triangulation of the tabulated cells</li>
          <li>Outside the tabulated region no value is extrapolated and the calculation stops</li>
        </ul>

        <h2>2. Constructive branch height</h2>
        <ul><li>h_s = √(1.25 · (d_a − s_s) · (s_s − c))</li></ul>

        <h2>3. Minimum branch wall thickness</h2>
        <ul>
          <li>s_os = p · d_a / (2 · [σ] · φ + p)</li>
          <li>φ = 1.0 as a first approximation; not refined iteratively</li>
        </ul>

        <h2>4. Compensating reinforcement area</h2>
        <ul>
          <li>f_s = 2 · h_s · ((s_s − c) − s_os)</li>
          <li>Reported as calculated; a negative value means the branch wall is thinner than required</li>
        </ul>

        <h2>5. Strength factor of the unreinforced opening</h2>
        <ul>
          <li>D_m = D_a − s</li>
          <li>z = d_a / √(D_m · (s − c))</li>
          <li>φ_od = 2 / (z + 1.75)</li>
        </ul>

        <h2>6. Strength factor of the reinforced opening</h2>
        <ul><li>φ_oc = φ_od · (1 + f_s / (2 · (s − c) · √(D_m · (s − c))))</li></ul>

        <h2>7. Reduced stress</h2>
        <ul>
          <li>σ = p · (D_a − (s − c)) / (2 · φ_oc · (s − c))</li>
          <li>A non-positive φ_oc stops the calculation</li>
        </ul>

        <h2>8. Strength condition</h2>
        <ul>
          <li>The joint passes when σ ≤ [σ]</li>
          <li>Safety factor n = [σ] / σ; adequate when n ≥ 1</li>
        </ul>

        <h2>Known limitations</h2>
        <ul>
          <li>One steel grade (12Kh1MF) and one design code</li>
          <li>Internal pressure only; no external loads, bending or fatigue</li>
          <li>Only a single branch; interaction between neighbouring openings is not assessed</li>
          <li>
            Each rectangle of four tabulated values can be split into two triangles along either
            diagonal. This calculator keeps the diagonal it meets first, so inside some cells
            the interpolated [σ] differs from tools that split the other way (for example
            117.14 against 115.27 MPa at 474.2 °C and 273 282 h). Tabulated values are always
            reproduced exactly.
          </li>
          <li>Results are not a substitute for review by a qualified engineer</li>
        </ul>
      </div>
    </div>
  );
}
