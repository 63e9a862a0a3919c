/**
 * Multi-modal message parts.
 *
 * Input parts are authored by the user; output parts are generated by the
 * assistant and never include files. Each case carries its payload under the
 * field named like its tag.
 */

import type { Extra } from "./extension.js";

export const INPUT_PART_TYPES = ["text", "image", "audio", "video", "file"] as const;
export const OUTPUT_PART_TYPES = ["text", "image", "audio", "video"] as const;

export type AgenticMessagePartType = (typeof INPUT_PART_TYPES)[number];

export const IMAGE_URL_DETAILS = ["high", "low", "auto"] as const;

/** Quality hint for image inputs. */
export type ImageURLDetail = (typeof IMAGE_URL_DETAILS)[number];

/**
 * Fields shared by every media payload. At least one of `url` and
 * `base64Data` is expected; both may be set as a fallback.
 */
export interface AgenticMessageMedia {
  /** A traditional URL or an RFC 2397 data URL. */
  url?: string;
  base64Data?: string;
  /** e.g. "image/png", "audio/wav" */
  mimeType: string;
  extra?: Extra;
}

export interface AgenticMessageInputText {
  content: string;
}

export interface AgenticMessageInputImage extends AgenticMessageMedia {
  detail?: ImageURLDetail;
}

export type AgenticMessageInputAudio = AgenticMessageMedia;

export type AgenticMessageInputVideo = AgenticMessageMedia;

export interface AgenticMessageInputFile extends AgenticMessageMedia {
  /** Used when the file is passed to the model as a string. */
  name?: string;
}

export type AgenticMessageInputPart =
  | { type: "text"; text: AgenticMessageInputText }
  | { type: "image"; image: AgenticMessageInputImage }
  | { type: "audio"; audio: AgenticMessageInputAudio }
  | { type: "video"; video: AgenticMessageInputVideo }
  | { type: "file"; file: AgenticMessageInputFile };

export interface AgenticMessageOutputText {
  content: string;
  extra?: Extra;
}

export type AgenticMessageOutputImage = AgenticMessageMedia;

export type AgenticMessageOutputAudio = AgenticMessageMedia;

export type AgenticMessageOutputVideo = AgenticMessageMedia;

export type AgenticMessageOutputPart =
  | { type: "text"; text: AgenticMessageOutputText }
  | { type: "image"; image: AgenticMessageOutputImage }
  | { type: "audio"; audio: AgenticMessageOutputAudio }
  | { type: "video"; video: AgenticMessageOutputVideo };
