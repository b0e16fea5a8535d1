import { DEFAULT_PRIORITY_BRANCHES } from './branch.js'
import { AllocationInvariantError } from './errors.js'
import type { Group, StudentRecord } from './types.js'

export interface BranchwiseOptions {
  priority?: readonly string[]
}

function distinctBranches(records: readonly StudentRecord[]): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const record of records) {
    if (seen.has(record.Branch)) continue
    seen.add(record.Branch)
    out.push(record.Branch)
  }
  return out
}

function partitionByBranch(records: readonly StudentRecord[]): Map<string, StudentRecord[]> {
  const byBranch = new Map<string, StudentRecord[]>()
  for (const record of records) {
    const list = byBranch.get(record.Branch)
    if (list) {
      list.push(record)
    } else {
      byBranch.set(record.Branch, [record])
    }
  }
  return byBranch
}

export function drawCycle(records: readonly StudentRecord[], priority: readonly string[] = DEFAULT_PRIORITY_BRANCHES): string[] {
  const active = distinctBranches(records)
  const present = new Set(active)
  const listed = new Set(priority)
  return [
    ...Array.from(listed).filter((code) => present.has(code)),
    ...active.filter((code) => !listed.has(code)),
  ]
}

export function groupTargets(total: number, groups: number): number[] {
  const base = Math.floor(total / groups)
  const remainder = total % groups
  return Array.from({ length: groups }, (_, i) => base + (i < remainder ? 1 : 0))
}

export function chunkSizeFor(total: number, groups: number): number {
  return Math.ceil(total / groups)
}

/**
 * Fills one group per target, in order, by sweeping `cycle` and taking one
 * record per branch per round until the group reaches its target.
 *
 * A round in which no branch has stock left ends the group even when it is
 * short of its target; later groups are then short as well. Nothing is thrown
 * in that case and the caller sees fewer records than it passed in.
 */
export function drawRoundRobin(
  cycle: readonly string[],
  stock: Map<string, StudentRecord[]>,
  targets: readonly number[],
): Group[] {
  const bundles: StudentRecord[][] = []
  for (const limit of targets) {
    const bundle: StudentRecord[] = []
    while (bundle.length < limit) {
      let moved = false
      for (const code of cycle) {
        if (bundle.length >= limit) break
        const next = stock.get(code)?.shift()
        if (next) {
          bundle.push(next)
          moved = true
        }
      }
      if (!moved) break
    }
    bundles.push(bundle)
  }
  return bundles
}

/**
 * Branch-priority round robin: groups are sized `total div groups`, the first
 * `total mod groups` taking one extra record, and filled by `drawRoundRobin`.
 */
export function branchwiseAllocation(
  records: readonly StudentRecord[],
  groups: number,
  options: BranchwiseOptions = {},
): Group[] {
  const cycle = drawCycle(records, options.priority)
  const byBranch = partitionByBranch(records)
  const stock = new Map<string, StudentRecord[]>()
  for (const code of cycle) {
    stock.set(code, [...(byBranch.get(code) ?? [])])
  }
  return drawRoundRobin(cycle, stock, groupTargets(records.length, groups))
}

/**
 * Cuts every branch into full chunks of `ceil(total / groups)` records, then
 * packs the shorter tails together, longest first, splitting a tail when it
 * does not fit the space left in the group being built.
 */
export function uniformAllocation(records: readonly StudentRecord[], groups: number): Group[] {
  const total = records.length
  const packSize = chunkSizeFor(total, groups)
  const byBranch = partitionByBranch(records)
  const order = distinctBranches(records)
  const sortedCodes = order
    .map((code, index) => ({ code, index, size: byBranch.get(code)?.length ?? 0 }))
    .sort((a, b) => b.size - a.size || a.index - b.index)
    .map((entry) => entry.code)

  const bundles: StudentRecord[][] = []
  const tails: StudentRecord[][] = []
  for (const code of sortedCodes) {
    const rows = byBranch.get(code) ?? []
    let k = 0
    while (rows.length - k >= packSize) {
      bundles.push(rows.slice(k, k + packSize))
      k += packSize
    }
    if (k < rows.length) tails.push(rows.slice(k))
  }

  // Array#sort is stable, so equal-length tails keep branch order.
  const leftovers = tails.sort((a, b) => b.length - a.length)
  let block = leftovers.shift()
  while (block) {
    const bundle = [...block]
    let space = packSize - bundle.length
    while (space > 0 && leftovers.length) {
      const candidate = leftovers.shift()
      if (!candidate) break
      if (candidate.length <= space) {
        bundle.push(...candidate)
        space -= candidate.length
      } else {
        bundle.push(...candidate.slice(0, space))
        leftovers.unshift(candidate.slice(space))
        space = 0
      }
    }
    bundles.push(bundle)
    block = leftovers.shift()
  }

  while (bundles.length < groups) bundles.push([])

  const allocated = countAllocated(bundles)
  if (allocated !== total || bundles.length !== groups) {
    throw new AllocationInvariantError('Uniform allocation did not place every record exactly once', {
      input: total,
      allocated,
      groups,
      produced: bundles.length,
    })
  }
  return bundles
}

export function countAllocated(groups: readonly Group[]): number {
  return groups.reduce((sum, group) => sum + group.length, 0)
}
