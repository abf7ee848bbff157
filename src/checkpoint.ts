import { mkdir, rm, writeFile } from "fs/promises";
import { dirname, join } from "path";
import type { ContactRecord, Ledger } from "./types.js";

// ============================================
// Extraction Checkpoint
// ============================================
// Snapshot of the ledger written every few pages so a crashed run leaves
// something behind. Removed once the run has finished, whatever the outcome.

export const CHECKPOINT_FILE = "extraction_progress.json";

export interface CheckpointFile {
  processedCount: number;
  uniqueEmails: number;
  timestamp: string;
  emails: ContactRecord[];
}

export function checkpointPath(outputDir: string): string {
  return join(outputDir, CHECKPOINT_FILE);
}

export async function saveCheckpoint(path: string, ledger: Ledger, processedCount: number): Promise<void> {
  const file: CheckpointFile = {
    processedCount,
    uniqueEmails: ledger.size,
    timestamp: new Date().toISOString(),
    emails: [...ledger.values()],
  };
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(file, null, 2));
}

export async function removeCheckpoint(path: string): Promise<void> {
  await rm(path, { force: true });
}
