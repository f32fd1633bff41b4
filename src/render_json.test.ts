import { describe, it, expect } from "vitest";
import { renderJson, toUiStateRecord } from "./render_json.js";
import { parseTraceLog } from "./ui_model.js";

const now = new Date("2024-05-01T12:00:00.000Z");

const log = [
  "[1] RENDER: Face(main) Position(0,0) Size(260x260) Color(0x000000)",
  "[2] RENDER: Clock(10:09) Position(130,130) Font(MEDIUM) Color(0xFFFFFF)",
  "[3] RENDER: Dot(sec) Position(130,20) Size(3) Color(0xFF)",
].join("\n");

describe("toUiStateRecord", () => {
  it("keeps document order rather than z-index order", () => {
    const record = toUiStateRecord(parseTraceLog(log, { now }));
    expect(record.elements.map((e) => [e.id, e.z_index])).toEqual([
      ["clock_1", 10],
      ["dot_2", 5],
      ["face_3", 8],
    ]);
  });

  it("keeps the field order of each element", () => {
    const record = toUiStateRecord(parseTraceLog(log, { now }));
    expect(Object.keys(record.elements[0])).toEqual([
      "id",
      "type",
      "x",
      "y",
      "text_content",
      "font_family",
      "font_size",
      "font_weight",
      "fill_color",
      "text_anchor",
      "z_index",
      "visible",
      "opacity",
    ]);
    expect(record.elements[1]).toEqual({
      id: "dot_2",
      type: "circle",
      x: 130,
      y: 20,
      radius: 3,
      fill_color: "#0000FF",
      z_index: 5,
      visible: true,
      opacity: 1,
    });
  });

  it("copies instead of sharing the document's objects", () => {
    const doc = parseTraceLog(log, { now });
    const record = toUiStateRecord(doc);
    record.metadata.app_name = "changed";
    record.elements[0].x = 999;
    expect(doc.metadata.app_name).toBe("Garmin App");
    expect(doc.elements[0].x).toBe(130);
  });
});

describe("renderJson", () => {
  it("serializes the record with two-space indentation", () => {
    const doc = parseTraceLog("", { now });
    expect(renderJson(doc)).toBe(
      [
        "{",
        '  "version": "1.0",',
        '  "metadata": {',
        '    "app_name": "Garmin App",',
        '    "device_model": "fenix7",',
        '    "screen_width": 260,',
        '    "screen_height": 260,',
        '    "timestamp": "2024-05-01T12:00:00.000Z",',
        '    "capture_source": "debug_logs"',
        "  },",
        '  "screen": {',
        '    "background_color": "#000000",',
        '    "scale_factor": 1,',
        '    "center_x": 130,',
        '    "center_y": 130',
        "  },",
        '  "elements": [],',
        '  "state": {}',
        "}",
      ].join("\n"),
    );
  });

  it("round-trips through JSON.parse", () => {
    const doc = parseTraceLog(log, { now });
    expect(JSON.parse(renderJson(doc))).toEqual(toUiStateRecord(doc));
    expect(renderJson(doc)).toBe(renderJson(doc));
  });
});
