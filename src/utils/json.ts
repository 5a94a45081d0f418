import { UpstreamMalformedResponseError, errorMessage } from "../errors.js";

/**
 * Returns the first balanced `{...}` span of `text`, skipping braces inside JSON strings,
 * or null when there is none.
 */
export const extractJsonObject = (text: string): string | null => {
  let start = -1;
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      if (start >= 0) {
        inString = true;
      }
      continue;
    }

    if (char === "{") {
      if (start < 0) {
        start = index;
      }
      depth += 1;
      continue;
    }

    if (char === "}" && start >= 0) {
      depth -= 1;
      if (depth === 0) {
        return text.slice(start, index + 1);
      }
    }
  }

  return null;
};

export const parseJsonObjectText = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    const candidate = extractJsonObject(text);
    if (candidate === null) {
      throw new UpstreamMalformedResponseError("Completion did not contain a JSON object.");
    }
    try {
      return JSON.parse(candidate);
    } catch (error) {
      throw new UpstreamMalformedResponseError(`Completion JSON could not be parsed: ${errorMessage(error)}`);
    }
  }
};
