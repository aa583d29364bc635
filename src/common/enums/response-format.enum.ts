export enum ResponseFormat {
  /**
   * SHORT - AID and cursor only, field payload is never appended
   */
  SHORT = 'short',

  /**
   * LONG - Each field serialized as length followed by data
   */
  LONG = 'long',

  /**
   * STRUCTURED - Each field prefixed with a location tag
   */
  STRUCTURED = 'structured',
}

export enum FieldCollectionMode {
  NONE = 'none',
  MODIFIED_ONLY = 'modified-only',
  ALL = 'all',
}
