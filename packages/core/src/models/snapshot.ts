export interface SnapshotEntry {
  /** Path relative to the project root */
  path: string;
  /** Whether the path existed when the snapshot was taken */
  existed: boolean;
  /** sha256 of the captured bytes, when the path existed */
  blob?: string;
  /** Ancestor directories that did not exist either, deepest first */
  missingParents?: string[];
}

export type SnapshotState = 'active' | 'superseded' | 'restored';

export interface Snapshot {
  id: string;
  label: string;
  createdAt: string;
  entries: SnapshotEntry[];
  state: SnapshotState;
  /** Improvement that superseded this snapshot */
  improvementId?: string;
}

/** One line of the append-only snapshot index */
export type SnapshotIndexRecord =
  | { type: 'created'; id: string; label: string; createdAt: string; entries: SnapshotEntry[] }
  | { type: 'superseded'; id: string; improvementId: string; at: string }
  | { type: 'restored'; id: string; at: string }
  | { type: 'pruned'; id: string; at: string };
