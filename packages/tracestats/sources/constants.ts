export const TRACESTATS_NAME = "tracestats";

export const TRACE_ARRAY_KEY_DEFAULT = "structLogs";
export const TRACE_CATEGORY_FIELD_DEFAULT = "op";
export const TRACE_VALUE_FIELD_DEFAULT = "gasCost";
export const TRACE_FILTER_FIELD_DEFAULT = "depth";

export const TRACE_MAX_PENDING_DEFAULT = 100_000;
export const TRACE_JQ_PATH_DEFAULT = "jq";

export const TRACE_EXIT_USAGE = 2;
export const TRACE_EXIT_FAILURE = 1;
