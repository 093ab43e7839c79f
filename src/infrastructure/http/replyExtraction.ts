/**
 * Reply text extraction from a generator response whose shape is not fixed.
 * Strategies run in order; the first one yielding non-blank text wins.
 */
export type ExtractionStrategy = (payload: unknown) => string | undefined;

const LIST_FIELDS = ['candidates', 'outputs', 'output'] as const;
const ITEM_TEXT_FIELDS = ['content', 'text', 'output'] as const;
const TOP_LEVEL_TEXT_FIELDS = ['content', 'generated_text', 'response', 'text'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonBlank(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

/**
 * First non-blank string reached depth-first, object keys in insertion order
 */
export const firstStringDeep: ExtractionStrategy = (payload) => {
  const text = nonBlank(payload);
  if (text !== undefined) {
    return text;
  }

  const children = Array.isArray(payload)
    ? payload
    : isRecord(payload)
      ? Object.values(payload)
      : [];

  for (const child of children) {
    const found = firstStringDeep(child);
    if (found !== undefined) {
      return found;
    }
  }
  return undefined;
};

/**
 * `{ candidates: [...] }` and friends: text of the first list element.
 * A text field holding an object (Gemini's `content.parts[].text`) is searched
 * depth-first.
 */
export const fromCandidateList: ExtractionStrategy = (payload) => {
  if (!isRecord(payload)) {
    return undefined;
  }

  for (const field of LIST_FIELDS) {
    const list = payload[field];
    if (!Array.isArray(list) || list.length === 0) {
      continue;
    }

    const first: unknown = list[0];
    if (!isRecord(first)) {
      return nonBlank(first);
    }
    for (const textField of ITEM_TEXT_FIELDS) {
      const text = firstStringDeep(first[textField]);
      if (text !== undefined) {
        return text;
      }
    }
    return undefined;
  }
  return undefined;
};

export const fromTopLevelField: ExtractionStrategy = (payload) => {
  if (!isRecord(payload)) {
    return undefined;
  }
  for (const field of TOP_LEVEL_TEXT_FIELDS) {
    const text = nonBlank(payload[field]);
    if (text !== undefined) {
      return text;
    }
  }
  return undefined;
};

export const DEFAULT_EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  fromCandidateList,
  fromTopLevelField,
  firstStringDeep,
];

export function extractReply(
  payload: unknown,
  strategies: readonly ExtractionStrategy[] = DEFAULT_EXTRACTION_STRATEGIES
): string | undefined {
  for (const strategy of strategies) {
    const text = strategy(payload);
    if (text !== undefined && text.trim().length > 0) {
      return text;
    }
  }
  return undefined;
}
