/**
 * Constructors for message parts. Each sets the tag and its payload together.
 */

import type { Extra } from "../types/extension.js";
import type {
  AgenticMessageInputPart,
  AgenticMessageOutputPart,
  ImageURLDetail,
} from "../types/parts.js";

/** Where the media bytes come from. At least one source is required. */
export type MediaSource =
  | { url: string; base64Data?: string }
  | { url?: string; base64Data: string };

export interface MediaOptions {
  extra?: Extra;
}

export function inputTextPart(content: string): AgenticMessageInputPart {
  return { type: "text", text: { content } };
}

export function inputImagePart(
  source: MediaSource,
  mimeType: string,
  options: MediaOptions & { detail?: ImageURLDetail } = {},
): AgenticMessageInputPart {
  return { type: "image", image: { ...source, mimeType, ...options } };
}

export function inputAudioPart(source: MediaSource, mimeType: string, options: MediaOptions = {}): AgenticMessageInputPart {
  return { type: "audio", audio: { ...source, mimeType, ...options } };
}

export function inputVideoPart(source: MediaSource, mimeType: string, options: MediaOptions = {}): AgenticMessageInputPart {
  return { type: "video", video: { ...source, mimeType, ...options } };
}

export function inputFilePart(
  source: MediaSource,
  mimeType: string,
  options: MediaOptions & { name?: string } = {},
): AgenticMessageInputPart {
  return { type: "file", file: { ...source, mimeType, ...options } };
}

export function outputTextPart(content: string, options: MediaOptions = {}): AgenticMessageOutputPart {
  return { type: "text", text: { content, ...options } };
}

export function outputImagePart(source: MediaSource, mimeType: string, options: MediaOptions = {}): AgenticMessageOutputPart {
  return { type: "image", image: { ...source, mimeType, ...options } };
}

export function outputAudioPart(source: MediaSource, mimeType: string, options: MediaOptions = {}): AgenticMessageOutputPart {
  return { type: "audio", audio: { ...source, mimeType, ...options } };
}

export function outputVideoPart(source: MediaSource, mimeType: string, options: MediaOptions = {}): AgenticMessageOutputPart {
  return { type: "video", video: { ...source, mimeType, ...options } };
}
