import { useCallback, useEffect, useRef, useState } from 'react';
import type React from 'react';
import { ViewportInteractionEngine } from '../core/InteractionEngine';
import { WheelAccumulator } from '../input/wheel';
import { createConsoleLogger } from '../utils/logger';
import type {
  CursorKind,
  InteractionConfigOverrides,
  InteractionEvent,
  InteractionHost,
  InteractiveSession,
  Logger,
  Modifiers,
  MouseButton,
  Rect,
  ViewMode
} from '../types';

export type OpenModifier = 'meta' | 'ctrl';

export type UseViewportInteractionOptions = {
  sessions: InteractiveSession[];
  termCols: number;
  termRows: number;
  fontCellW: number;
  fontCellH: number;
  viewMode?: ViewMode;
  focusedSession?: number;
  gridCols?: number;
  gridRows?: number;
  uiScale?: number;
  animatingRect?: Rect | null;
  openModifier?: OpenModifier;
  config?: InteractionConfigOverrides;
  logger?: Logger;
  onFocusSession?: (index: number) => void;
  onOpenUrl?: (url: string) => void;
  // Called once per animation frame after the engine advanced, for overlay drawing.
  onFrame?: (engine: ViewportInteractionEngine, host: InteractionHost) => void;
};

export type UseViewportInteractionReturn = {
  containerRef: React.RefObject<HTMLDivElement>;
  engine: ViewportInteractionEngine;
  cursor: CursorKind;
  requestFrame: () => void;
};

const CURSOR_CSS: Record<CursorKind, string> = {
  arrow: 'default',
  text: 'text',
  pointer: 'pointer'
};

const detectOpenModifier = (): OpenModifier => {
  if (typeof navigator === 'undefined') {
    return 'ctrl';
  }
  return /Mac|iPhone|iPad/.test(navigator.platform) ? 'meta' : 'ctrl';
};

const toButton = (button: number): MouseButton => {
  switch (button) {
    case 1:
      return 'middle';
    case 2:
      return 'right';
    default:
      return 'left';
  }
};

// useViewportInteraction binds pointer and wheel input on a container to a
// ViewportInteractionEngine and drives its frame loop.
export const useViewportInteraction = (options: UseViewportInteractionOptions): UseViewportInteractionReturn => {
  const containerRef = useRef<HTMLDivElement>(null);
  const optionsRef = useRef(options);
  optionsRef.current = options;

  const engineRef = useRef<ViewportInteractionEngine | null>(null);
  if (!engineRef.current) {
    engineRef.current = new ViewportInteractionEngine(options.sessions, {
      config: options.config,
      logger: options.logger ?? createConsoleLogger(options.config?.logLevel)
    });
  }
  const engine = engineRef.current;

  const [cursor, setCursor] = useState<CursorKind>(engine.getCursor());
  const requestFrameRef = useRef<() => void>(() => undefined);

  useEffect(() => {
    engine.setSessions(options.sessions);
    requestFrameRef.current();
  }, [engine, options.sessions]);

  useEffect(() => {
    engine.setHandlers({
      onFocusSession: index => optionsRef.current.onFocusSession?.(index),
      onOpenUrl: url => optionsRef.current.onOpenUrl?.(url),
      onCursorChange: setCursor
    });
  }, [engine]);

  const buildHost = useCallback((container: HTMLElement): InteractionHost => {
    const current = optionsRef.current;
    const width = container.clientWidth;
    const height = container.clientHeight;
    const gridCols = Math.max(1, current.gridCols ?? 1);
    const gridRows = Math.max(1, current.gridRows ?? 1);
    return {
      nowMs: performance.now(),
      windowW: width,
      windowH: height,
      gridCols,
      gridRows,
      cellW: width / gridCols,
      cellH: height / gridRows,
      viewMode: current.viewMode ?? 'full',
      focusedSession: current.focusedSession ?? 0,
      termCols: current.termCols,
      termRows: current.termRows,
      fontCellW: current.fontCellW,
      fontCellH: current.fontCellH,
      uiScale: current.uiScale ?? 1,
      mouseOverUi: false,
      animatingRect: current.animatingRect ?? null
    };
  }, []);

  useEffect(() => {
    const container = containerRef.current;
    if (!container) {
      return;
    }

    let frame: number | null = null;
    let disposed = false;
    const wheel = new WheelAccumulator();
    const openModifier = optionsRef.current.openModifier ?? detectOpenModifier();

    const runFrame = () => {
      frame = null;
      if (disposed) {
        return;
      }
      const host = buildHost(container);
      engine.update(host);
      optionsRef.current.onFrame?.(engine, host);
      engine.markFrameDrawn();
      if (engine.wantsFrame(host)) {
        scheduleFrame();
      }
    };

    const scheduleFrame = () => {
      if (frame === null && !disposed) {
        frame = requestAnimationFrame(runFrame);
      }
    };
    requestFrameRef.current = scheduleFrame;

    const localPoint = (event: MouseEvent) => {
      const rect = container.getBoundingClientRect();
      return { x: event.clientX - rect.left, y: event.clientY - rect.top };
    };

    const modifiersOf = (event: MouseEvent): Modifiers => ({
      open: openModifier === 'meta' ? event.metaKey : event.ctrlKey,
      shift: event.shiftKey,
      alt: event.altKey
    });

    const dispatch = (event: InteractionEvent, source: Event | null) => {
      const disposition = engine.handleEvent(buildHost(container), event);
      if (disposition === 'consumed' && source) {
        source.preventDefault();
        source.stopPropagation();
      }
      scheduleFrame();
    };

    const onMouseDown = (event: MouseEvent) => {
      dispatch(
        {
          type: 'mouseDown',
          ...localPoint(event),
          button: toButton(event.button),
          clicks: Math.max(1, event.detail),
          modifiers: modifiersOf(event)
        },
        event
      );
    };

    // Move and release are tracked on the window so drags that leave the container still end.
    const onMouseMove = (event: MouseEvent) => {
      dispatch({ type: 'mouseMove', ...localPoint(event), modifiers: modifiersOf(event) }, null);
    };

    const onMouseUp = (event: MouseEvent) => {
      dispatch({ type: 'mouseUp', ...localPoint(event), button: toButton(event.button) }, null);
    };

    const onWheel = (event: WheelEvent) => {
      const current = optionsRef.current;
      const rows = wheel.push(event, current.fontCellH, current.termRows);
      dispatch({ type: 'wheel', ...localPoint(event), ...rows }, event);
    };

    container.addEventListener('mousedown', onMouseDown, { capture: true });
    container.addEventListener('wheel', onWheel, { capture: true, passive: false });
    window.addEventListener('mousemove', onMouseMove);
    window.addEventListener('mouseup', onMouseUp);
    scheduleFrame();

    return () => {
      disposed = true;
      requestFrameRef.current = () => undefined;
      if (frame !== null) {
        cancelAnimationFrame(frame);
        frame = null;
      }
      container.removeEventListener('mousedown', onMouseDown, { capture: true });
      container.removeEventListener('wheel', onWheel, { capture: true });
      window.removeEventListener('mousemove', onMouseMove);
      window.removeEventListener('mouseup', onMouseUp);
    };
  }, [engine, buildHost]);

  useEffect(() => {
    const container = containerRef.current;
    if (container) {
      container.style.cursor = CURSOR_CSS[cursor];
    }
  }, [cursor]);

  const requestFrame = useCallback(() => {
    requestFrameRef.current();
  }, []);

  return { containerRef, engine, cursor, requestFrame };
};
