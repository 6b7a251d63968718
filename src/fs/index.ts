/**
 * @module fs
 *
 * The filesystem base class and the built-in backends.
 *
 * | Backend | Protocol | Paths |
 * |---------|----------|-------|
 * | {@link MemoryFileSystem} | `memory` | `/data/file.bin` |
 * | {@link LocalFileSystem} | `file` | `./data/file.bin`, `file:///tmp/file.bin` |
 * | {@link HttpFileSystem} | `http` | `https://cdn.example.com/file.bin` |
 */

export { AbstractFileSystem, isOpenMode } from './filesystem.js';
export type { LsOptions } from './filesystem.js';
export { MemoryFileSystem, MemoryFile } from './memory.js';
export { LocalFileSystem, LocalFile } from './local.js';
export type { LocalFileSystemOptions } from './local.js';
export { HttpFileSystem, HttpFile } from './http.js';
export type { HttpFileSystemOptions } from './http.js';
