// src/tables/actions.ts
// Event action keywords and their ActionType codes

export type ActionKeyword =
  | "play"
  | "stop"
  | "pause"
  | "resume"
  | "break"
  | "seek"
  | "setswitch"
  | "setstate"
  | "setgameparameter"
  | "resetgameparameter"
  | "mute"
  | "unmute";

export const ACTION_CODES: Record<ActionKeyword, number> = {
  play: 1,
  stop: 2,
  pause: 3,
  resume: 4,
  break: 5,
  seek: 6,
  mute: 7,
  unmute: 8,
  setgameparameter: 17,
  setstate: 18,
  setswitch: 19,
  resetgameparameter: 20,
};

export const PLAY_ACTION_CODE = ACTION_CODES.play;

function isActionKeyword(value: string): value is ActionKeyword {
  return Object.prototype.hasOwnProperty.call(ACTION_CODES, value);
}

/**
 * Resolve a DSL action keyword (any case) to its code.
 */
export function actionCode(keyword: string): number | undefined {
  const key = keyword.toLowerCase();
  return isActionKeyword(key) ? ACTION_CODES[key] : undefined;
}

/**
 * Keyword written by the reverse compiler for a stored ActionType code.
 * Unknown codes decode to PLAY.
 */
export function actionKeywordForCode(code: string | number): string {
  const n = typeof code === "number" ? code : Number.parseInt(code, 10);
  for (const [keyword, value] of Object.entries(ACTION_CODES)) {
    if (value === n) return keyword.toUpperCase();
  }
  return "PLAY";
}
