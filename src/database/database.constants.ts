export const DATABASE_CONFIG = "DATABASE_CONFIG";
export const DATA_SOURCE_OPTIONS = "DATA_SOURCE_OPTIONS";
