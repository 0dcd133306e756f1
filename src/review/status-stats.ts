/**
 * Status overview of a review
 * @module review/status-stats
 */

import { isTerminal, type RecordStatus } from '../core/status/lattice.js'
import { stageInput, type ProcessingStage } from '../core/status/stages.js'
import type { RecordStore } from '../core/store/record-store.js'

export interface StatusStats {
  /** Active records, collapsed duplicates excluded */
  total: number
  /** Counts of the statuses present */
  byStatus: Partial<Record<RecordStatus, number>>
  /** Records waiting at each stage's input status */
  pendingByStage: Record<ProcessingStage, number>
  /** Records collapsed into a survivor */
  collapsed: number
  /** Every active record reached a terminal status */
  completenessCondition: boolean
}

/**
 * Counts records per status and stage
 */
export function getStatusStats(store: RecordStore): StatusStats {
  const byStatus: Partial<Record<RecordStatus, number>> = {}
  let total = 0
  let collapsed = 0
  let open = 0
  for (const record of store.iterate({ includeCollapsed: true })) {
    if (store.isCollapsed(record.id)) {
      collapsed++
      continue
    }
    total++
    byStatus[record.status] = (byStatus[record.status] ?? 0) + 1
    if (!isTerminal(record.status)) open++
  }

  const pending = (stage: ProcessingStage) => byStatus[stageInput(stage)] ?? 0

  return {
    total,
    byStatus,
    pendingByStage: {
      load: pending('load'),
      prep: pending('prep'),
      dedupe: pending('dedupe'),
      prescreen: pending('prescreen'),
      pdf_get: pending('pdf_get'),
      pdf_prep: pending('pdf_prep'),
      screen: pending('screen'),
      data: pending('data'),
    },
    collapsed,
    completenessCondition: total > 0 && open === 0,
  }
}
