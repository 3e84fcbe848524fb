export interface Topic {
  readonly name: string;
  readonly keywords: readonly string[];
  readonly description?: string;
  readonly audience?: string;
}

/** Build a frozen topic; optional fields are omitted when empty. */
export function createTopic(
  name: string,
  keywords: readonly string[],
  extra: { description?: string; audience?: string } = {},
): Topic {
  return Object.freeze({
    name,
    keywords: Object.freeze([...keywords]),
    ...(extra.description ? { description: extra.description } : {}),
    ...(extra.audience ? { audience: extra.audience } : {}),
  });
}
