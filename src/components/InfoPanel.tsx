import type { ScanResult } from '../lib/scanner';
import { ARC, formatBits, orientationDegrees, type TopCode } from '../lib/topcode';

interface InfoPanelProps {
  scan: ScanResult | null;
  hoveredSymbol: TopCode | null;
  onHover: (symbol: TopCode | null) => void;
}

export function InfoPanel({ scan, hoveredSymbol, onHover }: InfoPanelProps) {
  if (!scan) {
    return (
      <div className="text-center py-8">
        <p className="text-sm text-gray-500 dark:text-gray-400">No image loaded</p>
      </div>
    );
  }

  return (
    <div className="space-y-6">
      {/* Scan Info */}
      <div>
        <h2 className="text-xs font-semibold uppercase tracking-wider text-gray-500 dark:text-gray-400 mb-3 px-1">
          Scan Info
        </h2>

        <div className="grid grid-cols-2 gap-x-4 gap-y-3">
          <InfoItem label="Image" value={`${scan.width}×${scan.height}`} />
          <InfoItem label="Symbols" value={scan.symbols.length.toString()} />
          <InfoItem label="Candidates" value={scan.candidateCount.toLocaleString()} />
          <InfoItem label="Tested" value={scan.testedCount.toLocaleString()} />
        </div>
      </div>

      {/* Symbol list */}
      {scan.symbols.length > 0 && (
        <div>
          <h2 className="text-xs font-semibold uppercase tracking-wider text-gray-500 dark:text-gray-400 mb-3 px-1">
            Codes
            <span className="ml-2 font-normal normal-case text-gray-400 dark:text-gray-500">
              in scan order
            </span>
          </h2>
          <div className="space-y-0.5">
            {scan.symbols.map((symbol, i) => (
              <button
                key={i}
                onMouseEnter={() => onHover(symbol)}
                onMouseLeave={() => onHover(null)}
                className={`w-full flex items-center justify-between px-2 py-1.5 rounded-lg text-sm transition-colors ${
                  symbol === hoveredSymbol
                    ? 'bg-amber-50 dark:bg-amber-900/20'
                    : 'hover:bg-gray-50 dark:hover:bg-gray-800/50'
                }`}
              >
                <span className="font-semibold text-gray-800 dark:text-gray-200 tabular-nums">{symbol.code}</span>
                <span className="font-mono text-xs text-gray-500 dark:text-gray-400">
                  ({symbol.x.toFixed(1)}, {symbol.y.toFixed(1)})
                </span>
              </button>
            ))}
          </div>
        </div>
      )}

      {/* Hover Info */}
      {hoveredSymbol && (
        <div>
          <h2 className="text-xs font-semibold uppercase tracking-wider text-gray-500 dark:text-gray-400 mb-3 px-1">
            Symbol Details
          </h2>

          <div className="p-3 bg-gray-50 dark:bg-gray-800/50 rounded-lg">
            <div className="text-sm font-semibold mb-3 flex items-center gap-2 text-amber-600 dark:text-amber-400">
              <div className="w-3 h-3 rounded-full" style={{ backgroundColor: 'rgb(255, 160, 0)' }} />
              Code {hoveredSymbol.code}
            </div>

            <div className="grid grid-cols-2 gap-x-4 gap-y-1.5 text-sm">
              <span className="text-gray-500 dark:text-gray-400">Bits</span>
              <span className="text-gray-800 dark:text-gray-200 font-mono text-xs">
                {formatBits(hoveredSymbol.code)}
              </span>

              <span className="text-gray-500 dark:text-gray-400">Center</span>
              <span className="text-gray-800 dark:text-gray-200 font-mono text-xs">
                ({hoveredSymbol.x.toFixed(2)}, {hoveredSymbol.y.toFixed(2)})
              </span>

              <span className="text-gray-500 dark:text-gray-400">Unit</span>
              <span className="text-gray-800 dark:text-gray-200 font-mono text-xs">
                {hoveredSymbol.unit.toFixed(2)}px
              </span>

              <span className="text-gray-500 dark:text-gray-400">Diameter</span>
              <span className="text-gray-800 dark:text-gray-200 font-mono text-xs">
                {hoveredSymbol.diameter.toFixed(1)}px
              </span>

              <span className="text-gray-500 dark:text-gray-400">Orientation</span>
              <span className="text-gray-800 dark:text-gray-200 font-mono text-xs">
                {orientationDegrees(hoveredSymbol).toFixed(1)}° ({(hoveredSymbol.orientation / ARC).toFixed(2)} arcs)
              </span>
            </div>
          </div>
        </div>
      )}
    </div>
  );
}

function InfoItem({ label, value }: { label: string; value: string }) {
  return (
    <div>
      <div className="text-xs text-gray-500 dark:text-gray-400 mb-0.5">{label}</div>
      <div className="text-base font-semibold text-gray-900 dark:text-gray-100 tabular-nums">
        {value}
      </div>
    </div>
  );
}
