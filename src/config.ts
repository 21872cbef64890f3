import { DEFAULT_CANVAS_SIZE, MAX_CANVAS_SIZE, MIN_CANVAS_SIZE } from "./canvas/canvas.js";

export type Env = Record<string, string | undefined>;

/** CLI option first, then BRUSHBOT_CANVAS_SIZE, then the default. */
export function resolveCanvasSize(option: string | undefined, env: Env = process.env): number {
  const raw = option ?? env.BRUSHBOT_CANVAS_SIZE;
  if (raw === undefined || raw.trim() === "") return DEFAULT_CANVAS_SIZE;

  const size = Number(raw);
  if (!Number.isInteger(size) || size < MIN_CANVAS_SIZE || size > MAX_CANVAS_SIZE) {
    throw new Error(`Canvas size must be an integer between ${MIN_CANVAS_SIZE} and ${MAX_CANVAS_SIZE}, got '${raw}'`);
  }
  return size;
}

export function resolveLenient(option: boolean | undefined, env: Env = process.env): boolean {
  if (option) return true;
  const raw = env.BRUSHBOT_LENIENT;
  return raw === "1" || raw === "true";
}
