/**
 * Finish Markers Module - Classification of "transaction already finished" failures
 *
 * Hosts report that a transaction ended before a request or commit could apply
 * only through error text. This module turns that text into a closed
 * {@link FinishReason} at the host boundary so the rest of the library matches
 * on types instead of strings.
 */

/** Why a transaction can no longer accept work */
export type FinishReason = 'transaction-finished' | 'connection-closing';

/**
 * A rule that recognizes a recoverable-finish failure
 *
 * - `message-suffix`: the error message ends with `suffix`
 * - `error-name`: the error's `name` (e.g. a DOMException name) equals `name`
 */
export type FinishMarker =
  | { readonly kind: 'message-suffix'; readonly reason: FinishReason; readonly suffix: string }
  | { readonly kind: 'error-name'; readonly reason: FinishReason; readonly name: string };

/** Maps any thrown value to a finish reason, or `null` when it is some other failure */
export type FinishClassifier = (thrown: unknown) => FinishReason | null;

/**
 * Markers known to be emitted by hosts
 *
 * @remarks
 * Only these two phrases are confirmed. Extend the set through
 * `IdbOptions.extraFinishMarkers` rather than editing this list.
 */
export const DEFAULT_FINISH_MARKERS: readonly FinishMarker[] = [
  { kind: 'message-suffix', reason: 'transaction-finished', suffix: 'The transaction has finished.' },
  { kind: 'message-suffix', reason: 'connection-closing', suffix: 'The database connection is closing.' },
];

/** @internal */
const readStringProperty = (thrown: unknown, property: 'message' | 'name'): string | undefined => {
  if (typeof thrown === 'string') {
    return property === 'message' ? thrown : undefined;
  }
  if (typeof thrown !== 'object' || thrown === null || !(property in thrown)) {
    return undefined;
  }
  const value: unknown = Reflect.get(thrown, property);
  return typeof value === 'string' ? value : undefined;
};

/** @internal */
const matchesMarker = (thrown: unknown, marker: FinishMarker): boolean => {
  switch (marker.kind) {
    case 'message-suffix':
      return readStringProperty(thrown, 'message')?.endsWith(marker.suffix) ?? false;
    case 'error-name':
      return readStringProperty(thrown, 'name') === marker.name;
    default: {
      const exhaustiveCheck: never = marker;
      return exhaustiveCheck;
    }
  }
};

/**
 * Creates a classifier from the built-in markers plus any extra ones
 *
 * @example
 * ```typescript
 * const classify = createFinishClassifier([
 *   { kind: 'error-name', reason: 'transaction-finished', name: 'TransactionInactiveError' },
 * ]);
 *
 * classify(new Error("Failed to execute 'get' on 'IDBObjectStore': The transaction has finished."));
 * // => 'transaction-finished'
 * ```
 */
export const createFinishClassifier = (extraMarkers: readonly FinishMarker[] = []): FinishClassifier => {
  const markers = [...DEFAULT_FINISH_MARKERS, ...extraMarkers];

  return (thrown: unknown): FinishReason | null => {
    if (thrown === null || thrown === undefined) {
      return null;
    }
    const marker = markers.find((candidate) => matchesMarker(thrown, candidate));
    return marker?.reason ?? null;
  };
};

/** Classifier using only {@link DEFAULT_FINISH_MARKERS} */
export const classifyFinish: FinishClassifier = createFinishClassifier();
