export { matchTrace, scanAll, scanFirst } from "./trace_patterns.js";
export type { TraceMatches, LineGrammar } from "./trace_patterns.js";
export { buildUiState, parseTraceLog, hexColor, fontSize } from "./ui_model.js";
export type { BuildOptions } from "./ui_model.js";
export { renderXml, sortByZIndex } from "./render_xml.js";
export type { XmlRenderOptions } from "./render_xml.js";
export { renderJson, toUiStateRecord } from "./render_json.js";
export type { UiStateRecord } from "./render_json.js";
export type { UiStateDocument, UiElement, TextElement, CircleElement, RectElement } from "./ui_state.js";
