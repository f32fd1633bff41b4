import fs from "fs";
import { fileURLToPath } from "url";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { describe, it, expect } from "vitest";
import { formatFloat, renderXml } from "./render_xml.js";
import { parseTraceLog } from "./ui_model.js";

const now = new Date("2024-05-01T12:00:00.000Z");
const fixture = fs.readFileSync(fileURLToPath(new URL("../fixtures/watchface.log", import.meta.url)), "utf8");

function elementIds(xml: string): string[] {
  return Array.from(xml.matchAll(/<element id="([^"]+)"/g), (m) => m[1]);
}

describe("renderXml", () => {
  it("renders the label example", () => {
    const doc = parseTraceLog(
      '[0.1] RENDER: Screen(260x260) Center(130,130)\n[0.2] RENDER: Label("Hi") Position(10,20) Font(LARGE) Color(0xFF0000)',
      { now },
    );
    expect(renderXml(doc)).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<garmin-ui-state version="1.0">',
        "  <metadata>",
        "    <app-name>Garmin App</app-name>",
        "    <device-model>fenix7</device-model>",
        "    <screen-width>260</screen-width>",
        "    <screen-height>260</screen-height>",
        "    <timestamp>2024-05-01T12:00:00.000Z</timestamp>",
        "    <capture-source>debug_logs</capture-source>",
        "  </metadata>",
        "  <screen>",
        "    <background-color>#000000</background-color>",
        "    <scale-factor>1.0</scale-factor>",
        "    <center-x>130</center-x>",
        "    <center-y>130</center-y>",
        "  </screen>",
        "  <elements>",
        '    <element id="label_1" type="text">',
        '      <position x="10" y="20"/>',
        '      <text-content>"Hi"</text-content>',
        "      <font-family>large</font-family>",
        "      <font-size>24</font-size>",
        "      <font-weight>bold</font-weight>",
        "      <text-anchor>middle</text-anchor>",
        "      <fill-color>#FF0000</fill-color>",
        "      <z-index>10</z-index>",
        "      <visible>true</visible>",
        "      <opacity>1.0</opacity>",
        "    </element>",
        "  </elements>",
        "</garmin-ui-state>",
      ].join("\n"),
    );
  });

  it("sorts elements by z-index and keeps discovery order on ties", () => {
    const doc = parseTraceLog(fixture, { now });
    expect(doc.elements.map((e) => e.id)).toEqual(["hournumber_1", "minutemarker_2", "faceeye_3", "faceeye_4"]);
    expect(elementIds(renderXml(doc))).toEqual(["minutemarker_2", "faceeye_3", "faceeye_4", "hournumber_1"]);
  });

  it("renders circle and rect specific children", () => {
    const xml = renderXml(parseTraceLog(fixture, { now }));
    expect(xml).toContain("      <radius>2.0</radius>\n      <fill-color>#ff0000</fill-color>");
    expect(xml).toContain('      <dimensions width="8" height="3"/>');
  });

  it("is byte-identical across runs", () => {
    const doc = parseTraceLog(fixture, { now });
    expect(renderXml(doc)).toBe(renderXml(doc));
  });

  it("does not reorder the document it renders", () => {
    const doc = parseTraceLog(fixture, { now });
    renderXml(doc);
    expect(doc.elements[0].id).toBe("hournumber_1");
  });

  it("produces XML that parses back into the same structure", () => {
    const parsed = new XMLParser({ ignoreAttributes: false, attributeNamePrefix: "@_" }).parse(
      renderXml(parseTraceLog(fixture, { now, device: "epix2" })),
    );
    const root = parsed["garmin-ui-state"];
    expect(root["@_version"]).toBe("1.0");
    expect(root.metadata["device-model"]).toBe("epix2");
    expect(root.metadata["screen-width"]).toBe(260);
    expect(root.elements.element).toHaveLength(4);
    expect(root.elements.element[0]["@_id"]).toBe("minutemarker_2");
    expect(root.elements.element[0]["@_type"]).toBe("circle");
  });

  it("writes text content verbatim unless escaping is requested", () => {
    const doc = parseTraceLog('[n] RENDER: Note(a<b & "c") Position(1,1) Font(SMALL) Color(0x1)', { now });
    const raw = renderXml(doc);
    expect(raw).toContain('      <text-content>a<b & "c"</text-content>');
    expect(XMLValidator.validate(raw)).not.toBe(true);

    const escaped = renderXml(doc, { escapeText: true });
    expect(escaped).toContain("      <text-content>a&lt;b &amp; &quot;c&quot;</text-content>");
    expect(XMLValidator.validate(escaped)).toBe(true);
  });
});

describe("formatFloat", () => {
  it("keeps one decimal for whole numbers", () => {
    expect(formatFloat(1)).toBe("1.0");
    expect(formatFloat(0)).toBe("0.0");
    expect(formatFloat(2.5)).toBe("2.5");
  });
});
