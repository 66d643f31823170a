import { describe, expect, it } from 'vitest';
import { ScrollbarState } from './ScrollbarState';

describe('ScrollbarState', () => {
  it('fades in on activity and becomes fully visible after the fade-in duration', () => {
    const state = new ScrollbarState();
    state.noteActivity(1000);
    expect(state.phase).toBe('fadingIn');

    state.update(1000);
    expect(state.alpha).toBe(0);

    state.update(1130);
    expect(state.phase).toBe('visible');
    expect(state.alpha).toBe(1);
  });

  it('stays visible while hovered and fades out after the idle delay', () => {
    const state = new ScrollbarState();
    state.noteActivity(0);
    state.update(130);
    state.setHovered(true, 200);

    state.update(5000);
    expect(state.phase).toBe('visible');
    expect(state.idleDeadlineMs).toBe(6500);

    state.setHovered(false, 5000);
    state.update(6499);
    expect(state.phase).toBe('visible');

    state.update(6500);
    expect(state.phase).toBe('fadingOut');
    expect(state.alpha).toBe(1);

    state.update(6720);
    expect(state.phase).toBe('hidden');
    expect(state.alpha).toBe(0);
  });

  it('reverses a fade-out from the current alpha', () => {
    const state = new ScrollbarState();
    state.noteActivity(0);
    state.update(130);
    state.update(1500);
    state.update(1610);
    const midAlpha = state.alpha;
    expect(midAlpha).toBeGreaterThan(0);
    expect(midAlpha).toBeLessThan(1);

    state.noteActivity(1610);
    expect(state.phase).toBe('fadingIn');
    expect(state.phaseStartAlpha).toBe(midAlpha);
  });

  it('records the grab offset when a drag begins', () => {
    const state = new ScrollbarState();
    const layout = {
      trackRect: { x: 0, y: 0, w: 12, h: 100 },
      thumbRect: { x: 1, y: 40, w: 10, h: 20 },
      thumbTravel: 80
    };
    state.beginDrag(layout, 47, 0);
    expect(state.dragging).toBe(true);
    expect(state.dragGrabOffsetPx).toBe(7);

    state.endDrag(10);
    expect(state.dragging).toBe(false);
    expect(state.idleDeadlineMs).toBe(1510);
  });

  it('asks for frames while fading and for one frame after each transition', () => {
    const state = new ScrollbarState();
    expect(state.wantsFrame(0)).toBe(false);

    state.noteActivity(0);
    expect(state.wantsFrame(0)).toBe(true);

    state.update(130);
    state.markDrawn();
    expect(state.wantsFrame(200)).toBe(true);

    state.setHovered(true, 200);
    expect(state.wantsFrame(200)).toBe(false);
  });

  it('honors custom timing', () => {
    const state = new ScrollbarState({ fadeInDurationMs: 0 });
    state.noteActivity(0);
    state.update(0);
    expect(state.phase).toBe('visible');
  });

  it('hides immediately', () => {
    const state = new ScrollbarState();
    state.noteActivity(0);
    state.update(130);
    state.hideNow();
    expect(state.alpha).toBe(0);
    expect(state.phase).toBe('hidden');
    expect(state.wantsFrame(0)).toBe(false);
  });
});
