import React, { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import {
  GhosttySession,
  createConsoleLogger,
  loadGhosttyTerminal,
  renderScrollbar,
  useViewportInteraction,
  type InteractionHost,
  type LoadedGhosttyTerminal,
  type ViewportInteractionEngine
} from '@paneview/viewport-interaction';
import { buildSampleOutput } from './sampleOutput';

const TERMINAL_PADDING = 8;
const ACCENT = { r: 122, g: 162, b: 247 };

const logger = createConsoleLogger('info');

type terminal_metrics = {
  cols: number;
  rows: number;
  fontCellW: number;
  fontCellH: number;
};

const measureTerminal = (pane: HTMLElement, loaded: LoadedGhosttyTerminal): terminal_metrics => {
  const { cols, rows } = loaded.terminal;
  const innerW = Math.max(0, pane.clientWidth - TERMINAL_PADDING * 2);
  const innerH = Math.max(0, pane.clientHeight - TERMINAL_PADDING * 2);
  return {
    cols,
    rows,
    fontCellW: cols > 0 ? innerW / cols : 0,
    fontCellH: rows > 0 ? innerH / rows : 0
  };
};

// drawScrollbarOverlay repaints the scrollbar canvas for the focused session.
const drawScrollbarOverlay = (canvas: HTMLCanvasElement | null, engine: ViewportInteractionEngine, host: InteractionHost) => {
  const ctx = canvas?.getContext('2d');
  if (!canvas || !ctx) {
    return;
  }

  const dpr = window.devicePixelRatio || 1;
  const width = Math.round(host.windowW * dpr);
  const height = Math.round(host.windowH * dpr);
  if (canvas.width !== width || canvas.height !== height) {
    canvas.width = width;
    canvas.height = height;
  }
  ctx.setTransform(dpr, 0, 0, dpr, 0, 0);
  ctx.clearRect(0, 0, host.windowW, host.windowH);

  const layout = engine.scrollbarLayout(host, host.focusedSession);
  const view = engine.getView(host.focusedSession);
  if (layout && view) {
    renderScrollbar(ctx, layout, ACCENT, view.scrollbar);
  }
};

export const App = () => {
  const paneRef = useRef<HTMLDivElement>(null);
  const overlayRef = useRef<HTMLCanvasElement>(null);
  const [loaded, setLoaded] = useState<LoadedGhosttyTerminal | null>(null);
  const [metrics, setMetrics] = useState<terminal_metrics>({ cols: 80, rows: 24, fontCellW: 0, fontCellH: 0 });
  const [status, setStatus] = useState('loading');
  const [error, setError] = useState('');
  const [lastUrl, setLastUrl] = useState('');

  useEffect(() => {
    const pane = paneRef.current;
    if (!pane) {
      return;
    }

    let disposed = false;
    let current: LoadedGhosttyTerminal | null = null;

    loadGhosttyTerminal(pane, { fontSize: 13, scrollback: 5000, cursorBlink: true }, logger)
      .then(result => {
        if (disposed) {
          result.dispose();
          return;
        }
        current = result;
        result.terminal.write(buildSampleOutput());
        result.terminal.onData(data => {
          result.terminal.write(data === '\r' ? '\r\n' : data);
        });
        setLoaded(result);
        setStatus('ready');
      })
      .catch(e => {
        setError(e instanceof Error ? e.message : String(e));
        setStatus('failed');
      });

    return () => {
      disposed = true;
      current?.dispose();
    };
  }, []);

  useEffect(() => {
    const pane = paneRef.current;
    if (!loaded || !pane) {
      return;
    }

    const remeasure = () => {
      loaded.fit();
      setMetrics(measureTerminal(pane, loaded));
    };

    remeasure();
    const subscription = loaded.terminal.onResize(() => setMetrics(measureTerminal(pane, loaded)));
    window.addEventListener('resize', remeasure);
    return () => {
      subscription.dispose();
      window.removeEventListener('resize', remeasure);
    };
  }, [loaded]);

  const sessions = useMemo(() => {
    if (!loaded) {
      return [];
    }
    return [
      new GhosttySession(0, loaded.grid, {
        onInput: data => logger.debug('[Playground] Mouse report', { bytes: data.length })
      })
    ];
  }, [loaded]);

  const onFrame = useCallback((engine: ViewportInteractionEngine, host: InteractionHost) => {
    drawScrollbarOverlay(overlayRef.current, engine, host);
  }, []);

  const { containerRef, engine, cursor, requestFrame } = useViewportInteraction({
    sessions,
    termCols: metrics.cols,
    termRows: metrics.rows,
    fontCellW: metrics.fontCellW,
    fontCellH: metrics.fontCellH,
    config: { terminalPadding: TERMINAL_PADDING },
    logger,
    onOpenUrl: url => {
      setLastUrl(url);
      window.open(url, '_blank', 'noopener');
    },
    onFrame
  });

  const copySelection = () => {
    const text = engine.getSelectionText(0);
    if (!text) {
      return;
    }
    navigator.clipboard.writeText(text).catch(e => {
      logger.warn('[Playground] Clipboard write failed', { error: e instanceof Error ? e.message : String(e) });
    });
  };

  const jumpToBottom = () => {
    engine.resetScrollIfNeeded(0);
    requestFrame();
  };

  return (
    <div className="app">
      <div className="main">
        <div className="toolbar">
          <div className="toolbarPrimary">
            <span className="appTitle">paneview</span>
            <span className="status">
              {status} :: {metrics.cols}x{metrics.rows} :: {cursor}
            </span>
          </div>
          <div className="toolbarActions">
            <button onClick={copySelection} disabled={!loaded}>
              copy selection
            </button>
            <button onClick={jumpToBottom} disabled={!loaded}>
              bottom
            </button>
          </div>
        </div>
        {error ? <div className="error">{error}</div> : null}
        {lastUrl ? <div className="status">opened {lastUrl}</div> : null}
        <div className="terminalContainer" ref={containerRef}>
          <div className="terminalPane" ref={paneRef} style={{ padding: TERMINAL_PADDING }} />
          <canvas className="scrollbarOverlay" ref={overlayRef} />
        </div>
      </div>
    </div>
  );
};
