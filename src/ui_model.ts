import { matchTrace, type CircleMatch, type RectMatch, type TextMatch, type TraceMatches } from "./trace_patterns.js";
import { Z_INDEX, type CircleElement, type RectElement, type TextElement, type UiElement, type UiStateDocument } from "./ui_state.js";

export type BuildOptions = {
  device?: string;
  appName?: string;
  now?: Date;
};

export const DEFAULT_DEVICE = "fenix7";
export const DEFAULT_APP_NAME = "Garmin App";
const DEFAULT_SCREEN_SIZE = 260;

const FONT_SIZES: Record<string, number> = {
  LARGE: 24,
  MEDIUM: 18,
  SMALL: 14,
  XTINY: 10,
};
const DEFAULT_FONT_SIZE = 16;

type Built<T> = { elements: T[]; nextId: number };

export function fontSize(font: string): number {
  return FONT_SIZES[font.toUpperCase()] ?? DEFAULT_FONT_SIZE;
}

/** `0x` tokens become `#RRGGBB`; anything else is assumed to be normalized already. */
export function hexColor(token: string): string {
  if (token.startsWith("0x")) return `#${token.slice(2).padStart(6, "0")}`;
  return token;
}

function decimal(s: string): number {
  const n = parseFloat(s);
  return Number.isFinite(n) ? n : 0;
}

function elementId(name: string, seq: number): string {
  return `${name.toLowerCase()}_${seq}`;
}

export function buildTextElements(matches: TextMatch[], firstId: number): Built<TextElement> {
  let nextId = firstId;
  const elements = matches.map((m): TextElement => ({
    id: elementId(m.name, nextId++),
    type: "text",
    x: m.x,
    y: m.y,
    text_content: m.content,
    font_family: m.font.toLowerCase(),
    font_size: fontSize(m.font),
    font_weight: m.font.includes("LARGE") ? "bold" : "normal",
    fill_color: hexColor(m.color),
    text_anchor: "middle",
    z_index: Z_INDEX.text,
    visible: true,
    opacity: 1.0,
  }));
  return { elements, nextId };
}

export function buildCircleElements(matches: CircleMatch[], firstId: number): Built<CircleElement> {
  let nextId = firstId;
  const elements = matches.map((m): CircleElement => ({
    id: elementId(m.name, nextId++),
    type: "circle",
    x: m.x,
    y: m.y,
    radius: decimal(m.size),
    fill_color: hexColor(m.color),
    z_index: Z_INDEX.circle,
    visible: true,
    opacity: 1.0,
  }));
  return { elements, nextId };
}

export function buildRectElements(matches: RectMatch[], firstId: number): Built<RectElement> {
  let nextId = firstId;
  const elements = matches.map((m): RectElement => ({
    id: elementId(m.name, nextId++),
    type: "rect",
    x: m.x,
    y: m.y,
    width: m.width,
    height: m.height,
    fill_color: hexColor(m.color),
    z_index: Z_INDEX.rect,
    visible: true,
    opacity: 1.0,
  }));
  return { elements, nextId };
}

export function buildUiState(matches: TraceMatches, opts: BuildOptions = {}): UiStateDocument {
  const screen = matches.screen;
  const texts = buildTextElements(matches.text, 1);
  const circles = buildCircleElements(matches.circle, texts.nextId);
  const rects = buildRectElements(matches.rect, circles.nextId);
  const elements: UiElement[] = [...texts.elements, ...circles.elements, ...rects.elements];

  // layout and state matches are recognized but not projected yet
  return {
    version: "1.0",
    metadata: {
      app_name: opts.appName ?? DEFAULT_APP_NAME,
      device_model: opts.device || DEFAULT_DEVICE,
      screen_width: screen?.width ?? DEFAULT_SCREEN_SIZE,
      screen_height: screen?.height ?? DEFAULT_SCREEN_SIZE,
      timestamp: (opts.now ?? new Date()).toISOString(),
      capture_source: "debug_logs",
    },
    screen: {
      background_color: "#000000",
      scale_factor: 1.0,
      center_x: screen?.centerX ?? DEFAULT_SCREEN_SIZE / 2,
      center_y: screen?.centerY ?? DEFAULT_SCREEN_SIZE / 2,
    },
    elements,
    state: {},
  };
}

export function parseTraceLog(text: string, opts: BuildOptions = {}): UiStateDocument {
  return buildUiState(matchTrace(text), opts);
}
