/** Prefix that turns a mapped name into the name of its `ctypes.Structure` binding. */
export const CTYPE_STRUCT_PREFIX = "C";

/** Runtime-supplied wrapper for 128-bit integers; stock ctypes stops at 64 bits. */
export const WIDE_INT_CTYPE = "c_uint128";

export function ctypeStructName(mappedName: string): string {
  return `${CTYPE_STRUCT_PREFIX}${mappedName}`;
}

/** ASCII-only uppercase; every other character is kept as is. */
export function toUpperAscii(name: string): string {
  let output = "";
  for (const char of name) {
    const code = char.charCodeAt(0);
    output += code >= 0x61 && code <= 0x7a ? String.fromCharCode(code - 32) : char;
  }
  return output;
}
