export const DEFAULT_SQLITE_PATH = ".local/matches.sqlite";
export const IN_MEMORY = ":memory:";
export const DEFAULT_LIST_LIMIT = 50;
