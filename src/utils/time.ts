export function nowIso(date = new Date()): string {
  return date.toISOString();
}

export function toJobTimestamp(date = new Date()): string {
  return date.toISOString().replace(/[-:]/g, '').slice(0, 15) + 'Z';
}
