export type UiMetadata = {
  readonly app_name: string;
  readonly device_model: string;
  readonly screen_width: number;
  readonly screen_height: number;
  readonly timestamp: string;
  readonly capture_source: "debug_logs";
};

export type UiScreen = {
  readonly background_color: string;
  readonly scale_factor: number;
  readonly center_x: number;
  readonly center_y: number;
};

type ElementBase = {
  readonly id: string;
  readonly x: number;
  readonly y: number;
  readonly fill_color: string;
  readonly z_index: number;
  readonly visible: boolean;
  readonly opacity: number;
};

export type TextElement = ElementBase & {
  readonly type: "text";
  readonly text_content: string;
  readonly font_family: string;
  readonly font_size: number;
  readonly font_weight: "bold" | "normal";
  readonly text_anchor: "middle";
};

export type CircleElement = ElementBase & {
  readonly type: "circle";
  readonly radius: number;
};

export type RectElement = ElementBase & {
  readonly type: "rect";
  readonly width: number;
  readonly height: number;
};

export type UiElement = TextElement | CircleElement | RectElement;

export type UiElementType = UiElement["type"];

export type UiStateDocument = {
  readonly version: "1.0";
  readonly metadata: UiMetadata;
  readonly screen: UiScreen;
  readonly elements: readonly UiElement[];
  readonly state: Readonly<Record<string, string>>;
};

export const Z_INDEX: Record<UiElementType, number> = {
  text: 10,
  circle: 5,
  rect: 8,
};
