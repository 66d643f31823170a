import type { InteractionConfig, InteractionConfigOverrides, LogLevel, ScrollbarConfig } from '../types';

const DEFAULT_SCROLLBAR: ScrollbarConfig = {
  idleHideDelayMs: 1500,
  fadeInDurationMs: 130,
  fadeOutDurationMs: 220,
  trackWidth: 12,
  edgeMargin: 4,
  trackMarginY: 4,
  minThumbHeight: 22
};

const DEFAULT_CONFIG: Omit<InteractionConfig, 'scrollbar'> = {
  terminalPadding: 8,
  linesPerTick: 1,
  scrollSensitivity: 0.08,
  maxScrollVelocity: 30,
  inertiaDecayConstant: 7.5,
  inertiaStopVelocity: 0.12,
  inertiaReferenceFps: 60,
  selectionEdgeThreshold: 50,
  selectionEdgeScrollRows: 1,
  attentionWaveMs: 400,
  logLevel: 'warn'
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export const getDefaultScrollbarConfig = (overrides: Partial<ScrollbarConfig> = {}): ScrollbarConfig => ({
  ...DEFAULT_SCROLLBAR,
  ...overrides
});

export const getDefaultInteractionConfig = (overrides: InteractionConfigOverrides = {}): InteractionConfig => {
  const { scrollbar, ...rest } = overrides;
  return {
    ...DEFAULT_CONFIG,
    ...rest,
    scrollbar: getDefaultScrollbarConfig(scrollbar)
  };
};

const finiteAtLeast = (value: unknown, min: number, fallback: number): number => {
  return typeof value === 'number' && Number.isFinite(value) && value >= min ? value : fallback;
};

// normalizeInteractionConfig replaces values that would break the math (NaN, negatives) with defaults.
export const normalizeInteractionConfig = (config: InteractionConfig): InteractionConfig => {
  const sb = config.scrollbar;
  return {
    terminalPadding: finiteAtLeast(config.terminalPadding, 0, DEFAULT_CONFIG.terminalPadding),
    linesPerTick: finiteAtLeast(config.linesPerTick, 0, DEFAULT_CONFIG.linesPerTick),
    scrollSensitivity: finiteAtLeast(config.scrollSensitivity, 0, DEFAULT_CONFIG.scrollSensitivity),
    maxScrollVelocity: finiteAtLeast(config.maxScrollVelocity, 0, DEFAULT_CONFIG.maxScrollVelocity),
    inertiaDecayConstant: finiteAtLeast(config.inertiaDecayConstant, 0, DEFAULT_CONFIG.inertiaDecayConstant),
    inertiaStopVelocity: finiteAtLeast(config.inertiaStopVelocity, 0, DEFAULT_CONFIG.inertiaStopVelocity),
    inertiaReferenceFps: finiteAtLeast(config.inertiaReferenceFps, 1, DEFAULT_CONFIG.inertiaReferenceFps),
    selectionEdgeThreshold: finiteAtLeast(config.selectionEdgeThreshold, 0, DEFAULT_CONFIG.selectionEdgeThreshold),
    selectionEdgeScrollRows: Math.trunc(
      finiteAtLeast(config.selectionEdgeScrollRows, 0, DEFAULT_CONFIG.selectionEdgeScrollRows)
    ),
    attentionWaveMs: finiteAtLeast(config.attentionWaveMs, 0, DEFAULT_CONFIG.attentionWaveMs),
    logLevel: LOG_LEVELS.includes(config.logLevel) ? config.logLevel : DEFAULT_CONFIG.logLevel,
    scrollbar: {
      idleHideDelayMs: finiteAtLeast(sb.idleHideDelayMs, 0, DEFAULT_SCROLLBAR.idleHideDelayMs),
      fadeInDurationMs: finiteAtLeast(sb.fadeInDurationMs, 0, DEFAULT_SCROLLBAR.fadeInDurationMs),
      fadeOutDurationMs: finiteAtLeast(sb.fadeOutDurationMs, 0, DEFAULT_SCROLLBAR.fadeOutDurationMs),
      trackWidth: finiteAtLeast(sb.trackWidth, 1, DEFAULT_SCROLLBAR.trackWidth),
      edgeMargin: finiteAtLeast(sb.edgeMargin, 0, DEFAULT_SCROLLBAR.edgeMargin),
      trackMarginY: finiteAtLeast(sb.trackMarginY, 0, DEFAULT_SCROLLBAR.trackMarginY),
      minThumbHeight: finiteAtLeast(sb.minThumbHeight, 1, DEFAULT_SCROLLBAR.minThumbHeight)
    }
  };
};
