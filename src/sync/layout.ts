/**
 * Archive layout:
 *   sessions/<machine_id>/<date>/<session_id>.jsonl
 *   metadata/<machine_id>/<session_id>.json
 */

import path from 'path';

import { METADATA_DIR, SESSIONS_DIR } from '../core/archive-repo.js';

export function sessionArchivePath(root: string, machineId: string, date: string, sessionId: string): string {
  return path.join(root, SESSIONS_DIR, machineId, date, `${sessionId}.jsonl`);
}

export function metadataArchivePath(root: string, machineId: string, sessionId: string): string {
  return path.join(root, METADATA_DIR, machineId, `${sessionId}.json`);
}

export function machineMetadataDir(root: string, machineId: string): string {
  return path.join(root, METADATA_DIR, machineId);
}
