/**
 * JSON-compatible value for free-form metadata persisted to disk
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | { [key: string]: JsonValue }
  | JsonValue[];
