import type { UiElement, UiStateDocument } from "./ui_state.js";

export type UiStateRecord = {
  version: string;
  metadata: Record<string, string | number>;
  screen: Record<string, string | number>;
  elements: Array<Record<string, string | number | boolean>>;
  state: Record<string, string>;
};

function elementRecord(el: UiElement): Record<string, string | number | boolean> {
  return { ...el };
}

/**
 * Field-for-field copy of the document. Elements stay in document (discovery) order;
 * only the XML projection sorts by z-index.
 */
export function toUiStateRecord(doc: UiStateDocument): UiStateRecord {
  return {
    version: doc.version,
    metadata: { ...doc.metadata },
    screen: { ...doc.screen },
    elements: doc.elements.map(elementRecord),
    state: { ...doc.state },
  };
}

export function renderJson(doc: UiStateDocument): string {
  return JSON.stringify(toUiStateRecord(doc), null, 2);
}
