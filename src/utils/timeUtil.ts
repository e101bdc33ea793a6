export const getIsoTime = (date: Date = new Date()): string => date.toISOString();
