import { createValueAdapter } from './adapter';

/**
 * Adapts a value produced by `JSON.parse` into a `SourceValue`.
 *
 * JSON `null` becomes a `null` scalar with the unquoted text `null`, the
 * same text `emitJson` writes for nodes without a value.
 */
export const fromJson = createValueAdapter({ acceptNull: true });
