import { useState, useCallback, useRef, useEffect } from 'react';
import { ImagePlus, Loader2, Target, X } from 'lucide-react';
import { useTheme } from './hooks/useTheme';
import { ThemeToggle } from './components/ThemeToggle';
import { TopCodeCanvas, type DisplayOptions } from './components/TopCodeCanvas';
import { ControlPanel } from './components/ControlPanel';
import { InfoPanel } from './components/InfoPanel';
import { firstImageFile, loadImage, loadImageFromUrl } from './lib/image-loader';
import { DEFAULT_MAX_CODE_DIAMETER, scanTopCodes, type ScanResult } from './lib/scanner';
import { setDebugMode } from './lib/debug';
import type { TopCode } from './lib/topcode';

const params = new URLSearchParams(window.location.search);

// Check for debug mode via URL parameter
const isDebugMode = params.get('debug') === '1';
if (isDebugMode) {
  setDebugMode(true);
  console.log('[TOPCODE DEBUG] Debug mode enabled');
}

// Optional image to load on start: ?image=<url>
const initialImageUrl = params.get('image');

function App() {
  const { theme, resolvedTheme, setTheme } = useTheme();

  const [image, setImage] = useState<ImageData | null>(null);
  const [scan, setScan] = useState<ScanResult | null>(null);
  const [hoveredSymbol, setHoveredSymbol] = useState<TopCode | null>(null);
  const [isLoading, setIsLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [isDragging, setIsDragging] = useState(false);
  const [maxCodeDiameter, setMaxCodeDiameter] = useState(DEFAULT_MAX_CODE_DIAMETER);

  const [display, setDisplay] = useState<DisplayOptions>({
    symbols: true,
    samples: false,
    threshold: false,
  });

  const fileInputRef = useRef<HTMLInputElement>(null);

  // Rescan whenever the image or the diameter bound changes
  useEffect(() => {
    if (!image) return;

    try {
      const outcome = scanTopCodes(image, { maxCodeDiameter, collectDebugInfo: true });
      if (!outcome.success) {
        setError(outcome.error);
        setScan(null);
        return;
      }

      if (isDebugMode) {
        console.log('[TOPCODE DEBUG] Scan result', {
          codes: outcome.scan.symbols.map(s => s.code),
          candidateCount: outcome.scan.candidateCount,
          testedCount: outcome.scan.testedCount,
        });
      }

      setError(null);
      setScan(outcome.scan);
      setHoveredSymbol(null);
    } catch (err) {
      console.error('[TOPCODE DEBUG] Scan error', err);
      setError(err instanceof Error ? err.message : 'Failed to scan image');
      setScan(null);
    }
  }, [image, maxCodeDiameter]);

  const processImage = useCallback(async (load: Promise<ImageData>) => {
    setIsLoading(true);
    setError(null);

    try {
      const imageData = await load;
      if (isDebugMode) {
        console.log('[TOPCODE DEBUG] Image loaded', {
          width: imageData.width,
          height: imageData.height,
        });
      }
      setImage(imageData);
    } catch (err) {
      console.error('[TOPCODE DEBUG] Image load error', err);
      setError(err instanceof Error ? err.message : 'Failed to load image');
    } finally {
      setIsLoading(false);
    }
  }, []);

  const processFile = useCallback((file: File) => processImage(loadImage(file)), [processImage]);

  useEffect(() => {
    if (initialImageUrl) {
      void processImage(loadImageFromUrl(initialImageUrl));
    }
  }, [processImage]);

  const openFile = useCallback((files: FileList | null | undefined) => {
    const file = firstImageFile(files);
    if (file) {
      void processFile(file);
    } else {
      setError('Please choose an image file');
    }
  }, [processFile]);

  const handleDrag = useCallback((e: React.DragEvent, over: boolean) => {
    e.preventDefault();
    e.stopPropagation();
    setIsDragging(over);
  }, []);

  const handleDrop = useCallback((e: React.DragEvent) => {
    handleDrag(e, false);
    openFile(e.dataTransfer.files);
  }, [handleDrag, openFile]);

  const browse = useCallback(() => {
    fileInputRef.current?.click();
  }, []);

  return (
    <div className="h-screen flex flex-col bg-gray-50 dark:bg-gray-950 text-gray-900 dark:text-gray-100 transition-colors">
      <header className="h-12 flex-none flex items-center gap-3 px-4 border-b border-gray-200 dark:border-gray-800 bg-white dark:bg-gray-900">
        <Target className="w-5 h-5 text-amber-500" />
        <span className="font-medium">TopCode Inspector</span>
        {isLoading && <Loader2 className="w-4 h-4 animate-spin text-gray-400" aria-label="Loading" />}

        <div className="ml-auto flex items-center gap-2">
          <button
            onClick={browse}
            className="flex items-center gap-1.5 px-3 py-1.5 rounded-lg text-sm font-medium bg-gray-900 dark:bg-gray-100 text-white dark:text-gray-900 hover:opacity-90 transition-opacity"
          >
            <ImagePlus className="w-4 h-4" />
            Open
          </button>
          <ThemeToggle theme={theme} setTheme={setTheme} />
        </div>
      </header>

      <main className="flex-1 flex min-h-0">
        <aside className="w-64 flex-none p-4 overflow-y-auto border-r border-gray-200 dark:border-gray-800 bg-white dark:bg-gray-900">
          <ControlPanel
            display={display}
            setDisplay={setDisplay}
            maxCodeDiameter={maxCodeDiameter}
            setMaxCodeDiameter={setMaxCodeDiameter}
          />
        </aside>

        <section
          className={`flex-1 flex flex-col min-w-0 p-3 transition-shadow ${isDragging ? 'ring-4 ring-inset ring-amber-400/60' : ''}`}
          onDragOver={e => handleDrag(e, true)}
          onDragLeave={e => handleDrag(e, false)}
          onDrop={handleDrop}
        >
          {error && (
            <div className="mb-3 flex items-center justify-between gap-3 px-3 py-2 rounded-lg text-sm bg-red-50 dark:bg-red-900/20 text-red-600 dark:text-red-400">
              <span>{error}</span>
              <button onClick={() => setError(null)} aria-label="Dismiss error">
                <X className="w-4 h-4" />
              </button>
            </div>
          )}

          {image ? (
            <TopCodeCanvas
              image={image}
              scan={scan}
              display={display}
              resolvedTheme={resolvedTheme}
              onHover={setHoveredSymbol}
              hoveredSymbol={hoveredSymbol}
            />
          ) : (
            <button
              onClick={browse}
              className="flex-1 rounded-xl border-2 border-dashed border-gray-300 dark:border-gray-700 text-sm text-gray-500 hover:border-amber-400 transition-colors"
            >
              Drop an image with TopCodes here, or click to open one
            </button>
          )}
        </section>

        <aside className="w-80 flex-none p-4 overflow-y-auto border-l border-gray-200 dark:border-gray-800 bg-white dark:bg-gray-900">
          <InfoPanel
            scan={scan}
            hoveredSymbol={hoveredSymbol}
            onHover={setHoveredSymbol}
          />
        </aside>
      </main>

      <input
        ref={fileInputRef}
        type="file"
        accept="image/*"
        onChange={e => openFile(e.target.files)}
        className="hidden"
      />
    </div>
  );
}

export default App;
