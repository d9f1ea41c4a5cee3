export const handlers: readonly string[] = [];
