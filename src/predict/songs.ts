export function songKey(name: string): string {
  return name.trim().toLowerCase();
}

export function includesSong(list: readonly string[] | undefined, name: string): boolean {
  if (!list || list.length === 0) {
    return false;
  }
  const key = songKey(name);
  return list.some((entry) => songKey(entry) === key);
}

export function slugifySong(name: string): string {
  return name
    .trim()
    .replace(/&/g, "and")
    .replace(/[()]/g, "")
    .replace(/\s+/g, "_");
}
