import { useRef, useEffect, useState, useCallback, useMemo } from 'react';
import { ZoomIn, ZoomOut, RotateCcw } from 'lucide-react';
import type { ScanResult } from '../lib/scanner';
import type { TopCode } from '../lib/topcode';
import type { ResolvedTheme } from '../hooks/useTheme';

export interface DisplayOptions {
  symbols: boolean;
  samples: boolean;
  threshold: boolean;
}

interface TopCodeCanvasProps {
  image: ImageData;
  scan: ScanResult | null;
  display: DisplayOptions;
  resolvedTheme: ResolvedTheme;
  onHover: (symbol: TopCode | null) => void;
  hoveredSymbol: TopCode | null;
}

const SYMBOL_COLOR = 'rgb(255, 160, 0)';
const HOVER_COLOR = 'rgb(0, 210, 210)';

function createLayer(width: number, height: number, pixels: Uint8ClampedArray): HTMLCanvasElement | null {
  const canvas = document.createElement('canvas');
  canvas.width = width;
  canvas.height = height;
  const ctx = canvas.getContext('2d');
  if (!ctx) return null;

  const imageData = ctx.createImageData(width, height);
  imageData.data.set(pixels);
  ctx.putImageData(imageData, 0, 0);
  return canvas;
}

export function TopCodeCanvas({
  image,
  scan,
  display,
  resolvedTheme,
  onHover,
  hoveredSymbol,
}: TopCodeCanvasProps) {
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const hoverCanvasRef = useRef<HTMLCanvasElement>(null);
  const containerRef = useRef<HTMLDivElement>(null);
  const [zoom, setZoom] = useState(1);
  const [pan, setPan] = useState({ x: 0, y: 0 });
  const [isDragging, setIsDragging] = useState(false);
  const [dragStart, setDragStart] = useState({ x: 0, y: 0 });

  const imageLayer = useMemo(() => createLayer(image.width, image.height, image.data), [image]);

  const previewLayer = useMemo(() => {
    const preview = scan?.debug?.preview;
    return preview ? createLayer(image.width, image.height, preview) : null;
  }, [image, scan]);

  // Image-to-screen transform
  const getView = useCallback(() => {
    const rect = containerRef.current?.getBoundingClientRect();
    if (!rect) return null;

    const fit = Math.min(rect.width / image.width, rect.height / image.height) * 0.9;
    const scale = fit * zoom;
    const originX = pan.x + (rect.width - image.width * scale) / 2;
    const originY = pan.y + (rect.height - image.height * scale) / 2;
    return { rect, scale, originX, originY };
  }, [image, zoom, pan]);

  // Render
  useEffect(() => {
    const canvas = canvasRef.current;
    const view = getView();
    if (!canvas || !view) return;

    const ctx = canvas.getContext('2d');
    if (!ctx) return;

    const { rect, scale, originX, originY } = view;
    const dpr = window.devicePixelRatio || 1;

    canvas.width = rect.width * dpr;
    canvas.height = rect.height * dpr;
    canvas.style.width = `${rect.width}px`;
    canvas.style.height = `${rect.height}px`;
    ctx.scale(dpr, dpr);

    ctx.fillStyle = resolvedTheme === 'dark' ? '#030712' : '#f3f4f6';
    ctx.fillRect(0, 0, rect.width, rect.height);

    const layer = display.threshold && previewLayer ? previewLayer : imageLayer;
    if (layer) {
      ctx.imageSmoothingEnabled = scale < 2;
      ctx.drawImage(layer, originX, originY, image.width * scale, image.height * scale);
    }

    if (!scan) return;

    // Data ring samples
    if (display.samples && scan.debug) {
      const radius = Math.max(1.5, scale);
      for (const points of scan.debug.samples) {
        for (const point of points) {
          ctx.fillStyle = point.value === 1 ? 'rgba(0, 200, 80, 0.9)' : 'rgba(230, 40, 40, 0.9)';
          ctx.beginPath();
          ctx.arc(originX + (point.x + 0.5) * scale, originY + (point.y + 0.5) * scale, radius, 0, Math.PI * 2);
          ctx.fill();
        }
      }
    }

    // Symbol outlines, orientation needle and code label
    if (display.symbols) {
      ctx.lineWidth = 2;
      ctx.font = '600 13px system-ui, -apple-system, sans-serif';
      ctx.textAlign = 'center';
      ctx.textBaseline = 'middle';

      for (const symbol of scan.symbols) {
        const cx = originX + (symbol.x + 0.5) * scale;
        const cy = originY + (symbol.y + 0.5) * scale;
        const radius = (symbol.diameter / 2) * scale;

        ctx.strokeStyle = SYMBOL_COLOR;
        ctx.beginPath();
        ctx.arc(cx, cy, radius, 0, Math.PI * 2);
        ctx.stroke();

        ctx.beginPath();
        ctx.moveTo(cx, cy);
        ctx.lineTo(cx + Math.cos(symbol.orientation) * radius, cy + Math.sin(symbol.orientation) * radius);
        ctx.stroke();

        ctx.fillStyle = SYMBOL_COLOR;
        ctx.fillText(symbol.code.toString(), cx, cy - radius - 10);
      }
    }
  }, [image, scan, display, imageLayer, previewLayer, resolvedTheme, getView]);

  // Hover overlay
  useEffect(() => {
    const hoverCanvas = hoverCanvasRef.current;
    const view = getView();
    if (!hoverCanvas || !view) return;

    const ctx = hoverCanvas.getContext('2d');
    if (!ctx) return;

    const { rect, scale, originX, originY } = view;
    const dpr = window.devicePixelRatio || 1;

    hoverCanvas.width = rect.width * dpr;
    hoverCanvas.height = rect.height * dpr;
    hoverCanvas.style.width = `${rect.width}px`;
    hoverCanvas.style.height = `${rect.height}px`;
    ctx.scale(dpr, dpr);
    ctx.clearRect(0, 0, rect.width, rect.height);

    if (!hoveredSymbol) return;

    const cx = originX + (hoveredSymbol.x + 0.5) * scale;
    const cy = originY + (hoveredSymbol.y + 0.5) * scale;

    // Ring boundaries at 1, 2, 3 and 4 units
    ctx.strokeStyle = HOVER_COLOR;
    ctx.lineWidth = 1.5;
    for (let ring = 1; ring <= 4; ring++) {
      ctx.beginPath();
      ctx.arc(cx, cy, hoveredSymbol.unit * ring * scale, 0, Math.PI * 2);
      ctx.stroke();
    }
  }, [hoveredSymbol, getView]);

  // Mouse handlers
  const handleMouseDown = (e: React.MouseEvent) => {
    setIsDragging(true);
    setDragStart({ x: e.clientX - pan.x, y: e.clientY - pan.y });
  };

  const handleMouseMove = (e: React.MouseEvent) => {
    if (isDragging) {
      setPan({ x: e.clientX - dragStart.x, y: e.clientY - dragStart.y });
      return;
    }

    const view = getView();
    if (!scan || !view) return;

    const px = (e.clientX - view.rect.left - view.originX) / view.scale - 0.5;
    const py = (e.clientY - view.rect.top - view.originY) / view.scale - 0.5;
    const symbol = scan.symbols.find(s => Math.hypot(s.x - px, s.y - py) <= s.diameter / 2);
    onHover(symbol ?? null);
  };

  const handleMouseUp = () => setIsDragging(false);
  const handleMouseLeave = () => {
    setIsDragging(false);
    onHover(null);
  };

  // Zoom to mouse position
  const handleWheel = useCallback((e: React.WheelEvent) => {
    if (!containerRef.current) return;

    const rect = containerRef.current.getBoundingClientRect();
    const mouseX = e.clientX - rect.left;
    const mouseY = e.clientY - rect.top;

    const factor = e.deltaY > 0 ? 0.9 : 1.1;
    const newZoom = Math.max(0.5, Math.min(20, zoom * factor));

    if (newZoom === zoom) return;

    const centerX = rect.width / 2;
    const centerY = rect.height / 2;

    const worldX = (mouseX - centerX - pan.x) / zoom;
    const worldY = (mouseY - centerY - pan.y) / zoom;

    setZoom(newZoom);
    setPan({ x: mouseX - centerX - worldX * newZoom, y: mouseY - centerY - worldY * newZoom });
  }, [zoom, pan]);

  const resetView = () => {
    setZoom(1);
    setPan({ x: 0, y: 0 });
  };

  const zoomIn = useCallback(() => {
    setZoom(z => Math.min(20, z * 1.25));
  }, []);

  const zoomOut = useCallback(() => {
    setZoom(z => Math.max(0.5, z / 1.25));
  }, []);

  return (
    <div className="relative flex-1 bg-gray-100 dark:bg-gray-950 rounded-xl overflow-hidden transition-colors" ref={containerRef}>
      <canvas
        ref={canvasRef}
        className="w-full h-full"
        style={{ cursor: isDragging ? 'grabbing' : 'crosshair' }}
        onMouseDown={handleMouseDown}
        onMouseMove={handleMouseMove}
        onMouseUp={handleMouseUp}
        onMouseLeave={handleMouseLeave}
        onWheel={handleWheel}
      />
      <canvas
        ref={hoverCanvasRef}
        className="absolute inset-0 w-full h-full pointer-events-none"
      />

      {/* Zoom controls */}
      <div className="absolute top-3 right-3 flex flex-col gap-1.5">
        <button
          onClick={zoomIn}
          className="p-2 bg-white dark:bg-gray-800 rounded-lg shadow-sm hover:bg-gray-50 dark:hover:bg-gray-700 transition-colors border border-gray-200 dark:border-gray-700"
          title="Zoom in"
        >
          <ZoomIn className="w-4 h-4 text-gray-600 dark:text-gray-300" />
        </button>
        <button
          onClick={zoomOut}
          className="p-2 bg-white dark:bg-gray-800 rounded-lg shadow-sm hover:bg-gray-50 dark:hover:bg-gray-700 transition-colors border border-gray-200 dark:border-gray-700"
          title="Zoom out"
        >
          <ZoomOut className="w-4 h-4 text-gray-600 dark:text-gray-300" />
        </button>
        <button
          onClick={resetView}
          className="p-2 bg-white dark:bg-gray-800 rounded-lg shadow-sm hover:bg-gray-50 dark:hover:bg-gray-700 transition-colors border border-gray-200 dark:border-gray-700"
          title="Reset view"
        >
          <RotateCcw className="w-4 h-4 text-gray-600 dark:text-gray-300" />
        </button>
      </div>

      {/* Zoom indicator */}
      <div className="absolute bottom-3 right-3 px-2 py-1 bg-white/90 dark:bg-gray-800/90 rounded-md text-xs font-mono text-gray-600 dark:text-gray-400 backdrop-blur-sm border border-gray-200 dark:border-gray-700">
        {Math.round(zoom * 100)}%
      </div>
    </div>
  );
}
