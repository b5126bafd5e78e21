// src/core/fps/layers.ts

export const MAX_LAYER_CANDIDATES = 8;

/**
 * Layer names a frame-timeline table might use for `target`, most specific
 * first. For `SurfaceView[com.game/com.game.Main]#0`:
 *
 *   SurfaceView[com.game/com.game.Main]#0
 *   SurfaceView[com.game/com.game.Main]
 *   com.game/com.game.Main
 *   SurfaceView - com.game/com.game.Main#0
 *   SurfaceView - com.game/com.game.Main
 *   com.game
 */
export function layerCandidates(layer: string, target: string): string[] {
  const out: string[] = [];
  const add = (value: string | undefined) => {
    const s = (value ?? "").trim();
    if (s && !out.includes(s)) out.push(s);
  };

  const base = (layer ?? "").trim();
  add(base);

  const prefix = /^(SurfaceView\[[^\]]+\])/.exec(base);
  if (prefix) add(prefix[1]);

  const inner = /SurfaceView\[([^\]]+)\]/.exec(base);
  if (inner) {
    const area = (inner[1] ?? "").trim();
    add(area);
    add(`SurfaceView - ${area}#0`);
    add(`SurfaceView - ${area}`);
  }

  add(target);
  return out.slice(0, MAX_LAYER_CANDIDATES);
}

/**
 * Holds the compositor layer last associated with the target. Nothing feeds
 * it yet, so `hint` stays empty and candidates reduce to the target itself;
 * a layer-discovery source can call `observe()` without touching the loop.
 */
export class LayerTracker {
  private layer: string | null = null;
  private updatedAtMs = 0;

  get hint(): string {
    return this.layer ?? "";
  }

  get lastUpdateMs(): number {
    return this.updatedAtMs;
  }

  observe(layer: string, atMs: number) {
    const s = layer.trim();
    if (!s) return;
    this.layer = s;
    this.updatedAtMs = atMs;
  }

  candidatesFor(target: string): string[] {
    return this.layer ? layerCandidates(this.layer, target) : [target];
  }

  reset() {
    this.layer = null;
    this.updatedAtMs = 0;
  }
}
