export const BRIDGE_NAME = "wirebridge";

/** Reserved mapping keys that mark a tagged value on the wire. */
export const BYTES_MARKER = "__bytes__";
export const NDARRAY_MARKER = "__numpy_array__";
export const FRAME_MARKER = "__pandas_df__";

export const DEFAULT_LOG_LEVEL = "info";
export const DEFAULT_LOG_FORMAT = "text";
