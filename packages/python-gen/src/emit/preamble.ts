import type { ClientLibrary } from "@wirebind/schema";
import type { OutputBuffer } from "../buffer";
import { ctypeStructName, WIDE_INT_CTYPE } from "../naming";

const NOTICE = "Do not manually modify.";

export interface PreambleOptions {
  generatorName: string;
  runtimeModule: string;
  library: string;
}

/** `#`-framed banner marking the file as generated; the notice line is centered under the title. */
export function renderHeaderBox(out: OutputBuffer, generatorName: string): void {
  const title = `This file was auto-generated by ${generatorName}`;
  const innerWidth = Math.max(title.length, NOTICE.length);
  const left = Math.floor((innerWidth - NOTICE.length) / 2);
  const border = "#".repeat(innerWidth + 6);

  out.line(border);
  out.line(`## ${title.padEnd(innerWidth)} ##`);
  out.line(`## ${" ".repeat(left)}${NOTICE.padEnd(innerWidth - left)} ##`);
  out.line(border);
}

export function runtimeImports(library: string): string[] {
  return [WIDE_INT_CTYPE, "dataclass", library, "validate_uint"].sort();
}

export function renderPreamble(out: OutputBuffer, options: PreambleOptions): void {
  renderHeaderBox(out, options.generatorName);
  out.line("from __future__ import annotations");
  out.blank();
  out.line("import ctypes");
  out.line("import enum");
  out.line("from collections.abc import Callable # noqa: TCH003");
  out.line("from typing import Any");
  out.blank();
  out.line(`from ${options.runtimeModule} import ${runtimeImports(options.library).join(", ")}`);
  out.blank(2);
}

/** Mapped names of the client roles, as they appear in the generated module. */
export interface RoleNames {
  status: string;
  packet: string;
  handle: string;
}

/**
 * Declarations of the native lifecycle entry points: the completion callback type, then
 * init, init_echo, deinit and submit, each bound from the library handle.
 */
export function renderNativeFunctions(out: OutputBuffer, client: ClientLibrary, roles: RoleNames): void {
  const packetPointer = `ctypes.POINTER(${ctypeStructName(roles.packet)})`;
  const prefix = client.symbolPrefix;
  const initArgtypes = [
    `ctypes.POINTER(${roles.handle})`,
    WIDE_INT_CTYPE,
    "ctypes.c_char_p",
    "ctypes.c_uint32",
    "ctypes.c_void_p",
    "OnCompletion",
  ];

  out.line("# bytes_ptr is not a c_char_p: that type is for null-terminated strings only.");
  out.line(
    `OnCompletion = ctypes.CFUNCTYPE(None, ctypes.c_void_p, ${roles.handle}, ${packetPointer}, ctypes.c_uint64, ctypes.c_void_p, ctypes.c_uint32)`
  );
  out.blank();

  out.line("# Connects to the given addresses; completed packets are passed to the callback with its context.");
  renderNativeFunction(out, client.library, `${prefix}_init`, roles.status, initArgtypes);
  out.blank();

  out.line("# Same as init, but every submitted packet is echoed back.");
  renderNativeFunction(out, client.library, `${prefix}_init_echo`, roles.status, initArgtypes);
  out.blank();

  out.line("# Completes pending packets with a shutdown status, then frees the client.");
  out.line("# The client must not be used once deinit has been called.");
  renderNativeFunction(out, client.library, `${prefix}_deinit`, "None", [roles.handle]);
  out.blank();

  out.line("# Submits a packet whose operation, data and data_size are set.");
  renderNativeFunction(out, client.library, `${prefix}_submit`, "None", [roles.handle, packetPointer]);
  out.blank(2);
}

function renderNativeFunction(
  out: OutputBuffer,
  library: string,
  symbol: string,
  restype: string,
  argtypes: readonly string[]
): void {
  out.line(`${symbol} = ${library}.${symbol}`);
  out.line(`${symbol}.restype = ${restype}`);
  out.line(`${symbol}.argtypes = [${argtypes.join(", ")}]`);
}
