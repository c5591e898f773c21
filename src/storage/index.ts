/**
 * Storage module for VibeCoder
 * Agents and MCP servers live in one JSON file per id; layout preferences
 * in a single file with a rolling backup.
 */

export { JsonFileStore, serializeJson, type JsonFileStoreOptions } from './json-file-store.js';
export { writeJsonWithBackup, readJsonFile, backupPathFor } from './backup-file.js';
export type { EntityStore, LoadedDocument } from './storage-interface.js';
