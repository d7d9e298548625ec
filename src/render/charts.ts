/** Eighth-height blocks, empty to full */
export const SPARK_BLOCKS = " ▁▂▃▄▅▆▇█";

/** Eighth-width blocks, empty to full */
const BAR_BLOCKS = [" ", "▏", "▎", "▍", "▌", "▋", "▊", "▉", "█"];
const TRACK = "░";

/**
 * Shrink `values` to `width` points, keeping the maximum of each bucket
 * so spikes stay visible. Shorter input is returned unchanged.
 */
export function downsample(values: readonly number[], width: number): number[] {
  if (values.length <= width) return [...values];

  const step = values.length / width;
  const result: number[] = [];
  for (let i = 0; i < width; i++) {
    const chunk = values.slice(Math.floor(i * step), Math.floor((i + 1) * step));
    result.push(chunk.length > 0 ? Math.max(...chunk) : 0);
  }
  return result;
}

/** One block per value, scaled to the largest. */
export function renderSparkline(values: readonly number[]): string {
  if (values.length === 0) return "";
  const max = Math.max(...values);
  const top = SPARK_BLOCKS.length - 1;
  if (max <= 0) return SPARK_BLOCKS[0].repeat(values.length);

  return values
    .map((v) => SPARK_BLOCKS[Math.min(top, Math.max(0, Math.floor((v / max) * top)))])
    .join("");
}

/**
 * Horizontal bar `width` cells wide, with eighth-cell resolution for the
 * partially filled cell and a shaded track for the rest.
 */
export function renderBar(pct: number, width: number): string {
  if (width <= 0) return "";
  const clamped = Math.max(0, Math.min(100, pct));

  const exact = (clamped / 100) * width;
  let filled = Math.floor(exact);
  let bar = BAR_BLOCKS[8].repeat(filled);

  const eighths = Math.floor((exact - filled) * 8);
  if (eighths > 0 && filled < width) {
    bar += BAR_BLOCKS[eighths];
    filled++;
  }
  return bar + TRACK.repeat(width - filled);
}
