export function tag(name: string): string {
  return `fixture:${name}`;
}
