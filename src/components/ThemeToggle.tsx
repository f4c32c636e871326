import { Moon, Sun, Monitor, type LucideIcon } from 'lucide-react';
import type { Theme } from '../hooks/useTheme';

interface ThemeToggleProps {
  theme: Theme;
  setTheme: (theme: Theme) => void;
}

const THEME_OPTIONS: { value: Theme; icon: LucideIcon; label: string }[] = [
  { value: 'light', icon: Sun, label: 'Light' },
  { value: 'system', icon: Monitor, label: 'System' },
  { value: 'dark', icon: Moon, label: 'Dark' },
];

export function ThemeToggle({ theme, setTheme }: ThemeToggleProps) {
  return (
    <div role="radiogroup" aria-label="Theme" className="flex items-center p-1 rounded-lg bg-gray-100 dark:bg-gray-800 transition-colors">
      {THEME_OPTIONS.map(({ value, icon: Icon, label }) => {
        const selected = theme === value;
        return (
          <button
            key={value}
            role="radio"
            aria-checked={selected}
            onClick={() => setTheme(value)}
            className={`p-1.5 rounded-md transition-all ${
              selected
                ? 'bg-white dark:bg-gray-700 shadow-sm text-gray-900 dark:text-white'
                : 'text-gray-400 dark:text-gray-500 hover:text-gray-600 dark:hover:text-gray-300'
            }`}
            title={`${label} theme`}
          >
            <Icon className="w-4 h-4" />
          </button>
        );
      })}
    </div>
  );
}
