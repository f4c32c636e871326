import type { DisplayOptions } from './TopCodeCanvas';

interface ControlPanelProps {
  display: DisplayOptions;
  setDisplay: (display: DisplayOptions) => void;
  maxCodeDiameter: number;
  setMaxCodeDiameter: (diameter: number) => void;
}

const DISPLAY_ORDER: { key: keyof DisplayOptions; name: string; description: string }[] = [
  { key: 'symbols', name: 'Symbols', description: 'Outline, code and orientation' },
  { key: 'samples', name: 'Data Samples', description: 'Ring samples per sector' },
  { key: 'threshold', name: 'Threshold', description: 'Binarized image, candidates in green' },
];

const DIAMETER_PRESETS = [64, 160, 320, 640];

export function ControlPanel({
  display,
  setDisplay,
  maxCodeDiameter,
  setMaxCodeDiameter,
}: ControlPanelProps) {
  const toggle = (key: keyof DisplayOptions) => {
    setDisplay({ ...display, [key]: !display[key] });
  };

  return (
    <div className="space-y-6">
      {/* Display Section */}
      <div>
        <h2 className="text-xs font-semibold uppercase tracking-wider text-gray-500 dark:text-gray-400 mb-3 px-1">
          Display
        </h2>

        <div className="space-y-0.5">
          {DISPLAY_ORDER.map(({ key, name, description }) => (
            <label
              key={key}
              className="flex items-center gap-3 px-2 py-2 rounded-lg hover:bg-gray-50 dark:hover:bg-gray-800/50 cursor-pointer transition-colors group"
            >
              <input
                type="checkbox"
                checked={display[key]}
                onChange={() => toggle(key)}
                className="w-4 h-4 rounded border-gray-300 dark:border-gray-600 bg-white dark:bg-gray-700"
              />
              <div className="flex-1 min-w-0">
                <div className="text-sm font-medium text-gray-700 dark:text-gray-200">
                  {name}
                </div>
                <div className="text-xs text-gray-500 dark:text-gray-500 truncate">
                  {description}
                </div>
              </div>
            </label>
          ))}
        </div>
      </div>

      {/* Scan Section */}
      <div>
        <h2 className="text-xs font-semibold uppercase tracking-wider text-gray-500 dark:text-gray-400 mb-3 px-1">
          Scan
        </h2>

        <div className="px-2 space-y-3">
          <div className="flex items-center justify-between">
            <span className="text-sm text-gray-700 dark:text-gray-300">Max diameter</span>
            <span className="text-sm font-mono text-gray-800 dark:text-gray-200 tabular-nums">
              {maxCodeDiameter}px
            </span>
          </div>

          <input
            type="range"
            min={16}
            max={1280}
            step={8}
            value={maxCodeDiameter}
            onChange={(e) => setMaxCodeDiameter(Number(e.target.value))}
            className="w-full accent-amber-500"
          />

          <div className="flex gap-2">
            {DIAMETER_PRESETS.map(preset => (
              <button
                key={preset}
                onClick={() => setMaxCodeDiameter(preset)}
                className={`flex-1 py-1.5 text-xs font-medium rounded-lg transition-colors ${
                  preset === maxCodeDiameter
                    ? 'bg-gray-900 dark:bg-gray-100 text-white dark:text-gray-900'
                    : 'bg-gray-100 dark:bg-gray-800 hover:bg-gray-200 dark:hover:bg-gray-700 text-gray-600 dark:text-gray-300'
                }`}
              >
                {preset}
              </button>
            ))}
          </div>

          <p className="text-xs text-gray-500 dark:text-gray-500">
            Smaller values test fewer candidates but miss larger codes.
          </p>
        </div>
      </div>
    </div>
  );
}
