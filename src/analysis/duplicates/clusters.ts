/**
 * Duplicate index and cluster merger.
 *
 * 1. Every window hash goes into a global `hash -> [(file, start)]` index.
 * 2. Buckets are split into classes of windows whose token slices are equal.
 * 3. Each class is grown backward and forward while all members still agree,
 *    giving the maximal block shared by exactly that member set.
 * 4. Occurrences the caller rejects (suppressed lines) are removed.
 * 5. Blocks contained in a block with at least as many occurrences are dropped.
 *
 * Step 4 runs before step 5 so that a block that only survived containment
 * because of a suppressed occurrence is not reported on its own.
 *
 * Compare keys are interned to integers once, so slice comparison never
 * touches strings.
 */

import { DuplicateCluster, Location, Occurrence, Token } from "../types";

/**
 * One file's contribution to the index.
 */
export interface IndexedFile {
  file: string;
  tokens: Token[];
  /** Compare key per token (exact text or normalized form) */
  keys: string[];
  /** Window hash per start index */
  hashes: number[];
}

interface Member {
  file: number;
  start: number;
}

interface Block {
  /** Inclusive token ranges, one per member, sorted by (file, start) */
  members: Array<{ file: number; start: number; end: number }>;
  length: number;
}

/**
 * Find every maximal duplicated token block across `files`.
 *
 * @param files - Files of one language family, fingerprinted with the same window
 * @param windowSize - Window length the hashes were computed with
 * @param keep - Returns false for occurrences that must not take part in matching
 */
export function findDuplicateClusters(
  files: IndexedFile[],
  windowSize: number,
  keep: (occurrence: Location) => boolean = () => true
): DuplicateCluster[] {
  if (windowSize <= 0 || files.length === 0) {
    return [];
  }

  const ids = internKeys(files);
  const classes = buildClasses(files, ids, windowSize);
  const blocks = growBlocks(classes, ids, windowSize).flatMap((block) => {
    const members = block.members.filter((m) => keep(toLocation(m, files)));
    if (members.length < 2) {
      return [];
    }
    return [members.length === block.members.length ? block : { ...block, members }];
  });
  const maximal = dropContainedBlocks(blocks);

  return maximal.map((block) => toCluster(block, files));
}

// ============================================================================
// Interning and classes
// ============================================================================

function internKeys(files: IndexedFile[]): Int32Array[] {
  const table = new Map<string, number>();
  return files.map((f) => {
    const out = new Int32Array(f.keys.length);
    f.keys.forEach((key, i) => {
      let id = table.get(key);
      if (id === undefined) {
        id = table.size;
        table.set(key, id);
      }
      out[i] = id;
    });
    return out;
  });
}

function sliceEquals(ids: Int32Array[], a: Member, b: Member, length: number): boolean {
  const left = ids[a.file];
  const right = ids[b.file];
  for (let k = 0; k < length; k++) {
    if (left[a.start + k] !== right[b.start + k]) {
      return false;
    }
  }
  return true;
}

interface ClassTable {
  /** Classes with at least two members, in discovery order */
  members: Member[][];
  /** Per file, per window start: class id or -1 */
  classOf: Int32Array[];
}

function buildClasses(files: IndexedFile[], ids: Int32Array[], windowSize: number): ClassTable {
  const buckets = new Map<number, Member[]>();
  files.forEach((f, file) => {
    f.hashes.forEach((hash, start) => {
      const bucket = buckets.get(hash);
      if (bucket) {
        bucket.push({ file, start });
      } else {
        buckets.set(hash, [{ file, start }]);
      }
    });
  });

  const table: ClassTable = {
    members: [],
    classOf: files.map((f) => new Int32Array(f.hashes.length).fill(-1)),
  };

  for (const bucket of buckets.values()) {
    if (bucket.length < 2) {
      continue;
    }

    // Equal hashes are only candidates
    const groups: Member[][] = [];
    for (const member of bucket) {
      const group = groups.find((g) => sliceEquals(ids, g[0], member, windowSize));
      if (group) {
        group.push(member);
      } else {
        groups.push([member]);
      }
    }

    for (const group of groups) {
      if (group.length < 2) {
        continue;
      }
      const classId = table.members.length;
      table.members.push(group);
      for (const member of group) {
        table.classOf[member.file][member.start] = classId;
      }
    }
  }

  return table;
}

// ============================================================================
// Extension
// ============================================================================

function growBlocks(table: ClassTable, ids: Int32Array[], windowSize: number): Block[] {
  const processed = new Uint8Array(table.members.length);
  const blocks = new Map<string, Block>();

  // Deterministic order: by first member position
  const order = table.members
    .map((members, classId) => ({ classId, first: members[0] }))
    .sort((a, b) => a.first.file - b.first.file || a.first.start - b.first.start);

  for (const { classId } of order) {
    if (processed[classId]) {
      continue;
    }
    const members = table.members[classId];
    const first = members[0];
    const firstIds = ids[first.file];

    let back = 0;
    while (
      members.every((m) => m.start - back - 1 >= 0 && ids[m.file][m.start - back - 1] === firstIds[first.start - back - 1])
    ) {
      back++;
    }

    let forward = 0;
    while (
      members.every((m) => {
        const next = m.start + windowSize + forward;
        return next < ids[m.file].length && ids[m.file][next] === firstIds[first.start + windowSize + forward];
      })
    ) {
      forward++;
    }

    // Windows inside this block held by exactly these members would yield it again
    for (let offset = -back; offset <= forward; offset++) {
      const other = table.classOf[first.file][first.start + offset];
      if (other >= 0 && table.members[other].length === members.length) {
        processed[other] = 1;
      }
    }

    const length = windowSize + back + forward;
    const ranges = members
      .map((m) => ({ file: m.file, start: m.start - back, end: m.start - back + length - 1 }))
      .sort((a, b) => a.file - b.file || a.start - b.start);

    // A repeated pattern can make members of one file overlap; keep the earliest
    const kept: Block["members"] = [];
    for (const range of ranges) {
      const previous = kept[kept.length - 1];
      if (previous && previous.file === range.file && range.start <= previous.end) {
        continue;
      }
      kept.push(range);
    }
    if (kept.length < 2) {
      continue;
    }

    const key = kept.map((r) => `${r.file}:${r.start}:${r.end}`).join("|");
    if (!blocks.has(key)) {
      blocks.set(key, { members: kept, length });
    }
  }

  return [...blocks.values()];
}

// ============================================================================
// Maximality
// ============================================================================

function isInside(inner: Block["members"][number], outer: Block["members"][number]): boolean {
  return inner.file === outer.file && outer.start <= inner.start && inner.end <= outer.end;
}

/**
 * Drop X when some retained Y has at least as many occurrences and every
 * occurrence of X lies inside an occurrence of Y.
 */
function dropContainedBlocks(blocks: Block[]): Block[] {
  const sorted = [...blocks].sort(
    (a, b) => b.length - a.length || b.members.length - a.members.length
  );

  const retained: Block[] = [];
  // file -> retained blocks with an occurrence in that file
  const byFile = new Map<number, Set<Block>>();

  for (const block of sorted) {
    const candidates = byFile.get(block.members[0].file);
    let contained = false;

    if (candidates) {
      for (const other of candidates) {
        if (other.members.length < block.members.length) {
          continue;
        }
        if (block.members.every((m) => other.members.some((o) => isInside(m, o)))) {
          contained = true;
          break;
        }
      }
    }
    if (contained) {
      continue;
    }

    retained.push(block);
    for (const member of block.members) {
      let set = byFile.get(member.file);
      if (!set) {
        set = new Set();
        byFile.set(member.file, set);
      }
      set.add(block);
    }
  }

  return retained;
}

function toLocation(member: Block["members"][number], files: IndexedFile[]): Location {
  const tokens = files[member.file].tokens;
  return {
    file: files[member.file].file,
    startLine: tokens[member.start].startLine,
    endLine: tokens[member.end].endLine,
  };
}

function toCluster(block: Block, files: IndexedFile[]): DuplicateCluster {
  const occurrences: Occurrence[] = block.members.map((m) => ({
    ...toLocation(m, files),
    startToken: m.start,
    endToken: m.end,
  }));

  const first = block.members[0];
  return {
    tokens: files[first.file].tokens.slice(first.start, first.end + 1),
    tokenCount: block.length,
    occurrences,
  };
}
