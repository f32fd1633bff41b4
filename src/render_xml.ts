import type { UiElement, UiStateDocument } from "./ui_state.js";

export type XmlRenderOptions = {
  // Off by default: text content and attribute values are written verbatim.
  escapeText?: boolean;
};

function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Floats keep a trailing `.0` when integral, so `1` renders as `1.0`. */
export function formatFloat(n: number): string {
  return Number.isInteger(n) ? n.toFixed(1) : String(n);
}

export function sortByZIndex(elements: readonly UiElement[]): UiElement[] {
  // Array.prototype.sort is stable, so equal z-indexes keep discovery order.
  return [...elements].sort((a, b) => a.z_index - b.z_index);
}

function variantLines(el: UiElement, txt: (s: string) => string): string[] {
  switch (el.type) {
    case "text":
      return [
        `      <text-content>${txt(el.text_content)}</text-content>`,
        `      <font-family>${txt(el.font_family)}</font-family>`,
        `      <font-size>${el.font_size}</font-size>`,
        `      <font-weight>${el.font_weight}</font-weight>`,
        `      <text-anchor>${el.text_anchor}</text-anchor>`,
      ];
    case "circle":
      return [`      <radius>${formatFloat(el.radius)}</radius>`];
    case "rect":
      return [`      <dimensions width="${el.width}" height="${el.height}"/>`];
  }
}

function elementLines(el: UiElement, txt: (s: string) => string): string[] {
  return [
    `    <element id="${txt(el.id)}" type="${el.type}">`,
    `      <position x="${el.x}" y="${el.y}"/>`,
    ...variantLines(el, txt),
    `      <fill-color>${txt(el.fill_color)}</fill-color>`,
    `      <z-index>${el.z_index}</z-index>`,
    `      <visible>${el.visible ? "true" : "false"}</visible>`,
    `      <opacity>${formatFloat(el.opacity)}</opacity>`,
    "    </element>",
  ];
}

export function renderXml(doc: UiStateDocument, opts: XmlRenderOptions = {}): string {
  const txt = opts.escapeText ? esc : (s: string) => s;
  const { metadata, screen } = doc;
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<garmin-ui-state version="${doc.version}">`,
    "  <metadata>",
    `    <app-name>${txt(metadata.app_name)}</app-name>`,
    `    <device-model>${txt(metadata.device_model)}</device-model>`,
    `    <screen-width>${metadata.screen_width}</screen-width>`,
    `    <screen-height>${metadata.screen_height}</screen-height>`,
    `    <timestamp>${metadata.timestamp}</timestamp>`,
    `    <capture-source>${metadata.capture_source}</capture-source>`,
    "  </metadata>",
    "  <screen>",
    `    <background-color>${txt(screen.background_color)}</background-color>`,
    `    <scale-factor>${formatFloat(screen.scale_factor)}</scale-factor>`,
    `    <center-x>${screen.center_x}</center-x>`,
    `    <center-y>${screen.center_y}</center-y>`,
    "  </screen>",
    "  <elements>",
    ...sortByZIndex(doc.elements).flatMap((el) => elementLines(el, txt)),
    "  </elements>",
    "</garmin-ui-state>",
  ];
  return lines.join("\n");
}
