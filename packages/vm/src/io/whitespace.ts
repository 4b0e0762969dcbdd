// Delimiters between number tokens: space, \t, \n, \v, \f, \r
const DELIMITERS = new Set([0x20, 0x09, 0x0a, 0x0b, 0x0c, 0x0d])

export function isDelimiter(codepoint: number): boolean {
  return DELIMITERS.has(codepoint)
}
