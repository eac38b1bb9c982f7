import type { ScsiTopologyInterface } from '@storagecheck/shared';
import { DataConsistencyError } from '../errors.js';

/** Disc key -> 3-digit slot label */
export type LunIndex = ReadonlyMap<string, string>;

/** Trailing `-` segment of a LUN key, e.g. "key-vim.host.ScsiDisk-0200aa" -> "0200aa" */
export function discKeyOf(key: string): string {
  return key.slice(key.lastIndexOf('-') + 1);
}

export function slotLabel(lun: number): string {
  return String(lun).padStart(3, '0');
}

/**
 * Walks adapter -> target -> lun and maps each referenced LUN to its slot
 * number. Duplicate keys keep the last entry seen.
 */
export function buildLunIndex(topology: readonly ScsiTopologyInterface[]): LunIndex {
  const index = new Map<string, string>();
  for (const adapter of topology) {
    for (const target of adapter.target) {
      for (const lun of target.lun) {
        index.set(discKeyOf(lun.scsiLun), slotLabel(lun.lun));
      }
    }
  }
  return index;
}

export function resolveSlot(index: LunIndex, lunKey: string): string {
  const slot = index.get(discKeyOf(lunKey));
  if (slot === undefined) {
    throw new DataConsistencyError(`LUN ${lunKey} has no entry in the SCSI topology`);
  }
  return slot;
}
