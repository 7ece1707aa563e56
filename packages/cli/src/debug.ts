import {
  describeBranchSet,
  type BranchSet,
  type ResolvedOptions,
} from '@faultbranch/core';

/**
 * Print the effective configuration and one line per branch set to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printTreeDebug(
  root: BranchSet,
  resolved: ResolvedOptions
): void {
  process.stderr.write(
    `[faultbranch] effective config: ${JSON.stringify(resolved, null, 2)}\n`
  );

  const pending: Array<[BranchSet, string[]]> = [[root, []]];
  for (let entry = pending.shift(); entry; entry = pending.shift()) {
    const [bset, prefix] = entry;
    const at = prefix.length > 0 ? prefix.join('~') : '(root)';
    const flags = bset.collapsed ? ' collapsed' : '';
    process.stderr.write(
      `[faultbranch] tree: ${at} ${bset.uncertaintyType}${flags} ${describeBranchSet(bset)}\n`
    );
    for (const branch of bset.branches) {
      if (branch.bset) pending.push([branch.bset, [...prefix, branch.branchId]]);
    }
  }
}
