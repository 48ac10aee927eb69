export function stripBom(input: string): string {
  return input.charCodeAt(0) === 0xfeff ? input.substring(1) : input;
}
