export type ScreenMatch = {
  width: number;
  height: number;
  centerX: number;
  centerY: number;
};

export type TextMatch = {
  name: string;
  content: string;
  x: number;
  y: number;
  font: string;
  color: string;
};

export type CircleMatch = {
  name: string;
  content: string;
  x: number;
  y: number;
  size: string;
  color: string;
};

export type RectMatch = {
  name: string;
  content: string;
  x: number;
  y: number;
  width: number;
  height: number;
  color: string;
};

export type LabelMatch = {
  name: string;
  content: string;
};

export type TraceMatches = {
  screen?: ScreenMatch;
  text: TextMatch[];
  circle: CircleMatch[];
  rect: RectMatch[];
  layout: LabelMatch[];
  state: LabelMatch[];
};

export type LineGrammar<T> = {
  pattern: RegExp;
  read: (m: RegExpMatchArray) => T;
};

// Every grammar tolerates a bracketed prefix such as "[12.5]" or "[App] " ahead of the keyword.
const PREFIX = String.raw`\[.*?\] `;
const COLOR = String.raw`Color\((0x[0-9a-fA-F]+)\)`;
const POSITION = String.raw`Position\((\d+),(\d+)\)`;
// Name and font tokens accept any Unicode letter or digit, not just ASCII.
const WORD = String.raw`([\p{L}\p{N}_]+)`;

function grammar<T>(body: string, read: (m: RegExpMatchArray) => T): LineGrammar<T> {
  return { pattern: new RegExp(PREFIX + body, "gu"), read };
}

function int(s: string): number {
  return parseInt(s, 10);
}

export const screenGrammar = grammar<ScreenMatch>(
  String.raw`RENDER: Screen\((\d+)x(\d+)\) Center\((\d+),(\d+)\)`,
  (m) => ({ width: int(m[1]), height: int(m[2]), centerX: int(m[3]), centerY: int(m[4]) }),
);

export const textGrammar = grammar<TextMatch>(
  String.raw`RENDER: ${WORD}\(([^)]+)\) ${POSITION} Font\(${WORD}\) ${COLOR}`,
  (m) => ({ name: m[1], content: m[2], x: int(m[3]), y: int(m[4]), font: m[5], color: m[6] }),
);

export const circleGrammar = grammar<CircleMatch>(
  String.raw`RENDER: ${WORD}\(([^)]+)\) ${POSITION} Size\(([0-9.]+)\) ${COLOR}`,
  (m) => ({ name: m[1], content: m[2], x: int(m[3]), y: int(m[4]), size: m[5], color: m[6] }),
);

export const rectGrammar = grammar<RectMatch>(
  String.raw`RENDER: ${WORD}(?:\(([^)]+)\))? ${POSITION} Size\((\d+)x(\d+)\) ${COLOR}`,
  (m) => ({
    name: m[1],
    content: m[2] ?? "",
    x: int(m[3]),
    y: int(m[4]),
    width: int(m[5]),
    height: int(m[6]),
    color: m[7],
  }),
);

export const layoutGrammar = grammar<LabelMatch>(
  String.raw`LAYOUT: ${WORD}\(([^)]+)\)`,
  (m) => ({ name: m[1], content: m[2] }),
);

export const stateGrammar = grammar<LabelMatch>(
  String.raw`STATE: ${WORD}\(([^)]+)\)`,
  (m) => ({ name: m[1], content: m[2] }),
);

export function scanAll<T>(g: LineGrammar<T>, text: string): T[] {
  return Array.from(text.matchAll(g.pattern), g.read);
}

export function scanFirst<T>(g: LineGrammar<T>, text: string): T | undefined {
  const first = text.matchAll(g.pattern).next();
  return first.done ? undefined : g.read(first.value);
}

/**
 * Runs every grammar over the whole text. Categories are scanned independently, so a
 * line that satisfies two grammars contributes a match to both.
 */
export function matchTrace(text: string): TraceMatches {
  return {
    screen: scanFirst(screenGrammar, text),
    text: scanAll(textGrammar, text),
    circle: scanAll(circleGrammar, text),
    rect: scanAll(rectGrammar, text),
    layout: scanAll(layoutGrammar, text),
    state: scanAll(stateGrammar, text),
  };
}
