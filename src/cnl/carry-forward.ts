import type { Diagnostic } from '../kernel/diagnostics.js';
import { toMoveId, type MoveId } from '../kernel/branded.js';
import { getMove, lookupVerb } from '../kernel/rule-set.js';
import type { RuleSet } from '../kernel/types.js';
import { RPS_COMPILER_DIAGNOSTIC_CODES } from './compiler-diagnostic-codes.js';
import type { NormalizedDeclarations } from './normalize-declarations.js';
import type { StageResult } from './stage-result.js';
import type { CompletedRelationSpec, RelationEntry, RelationSpec } from './variant-spec.js';

/** Subject move, then the set of declared moves whose spec references it. */
export type RelationClaims = ReadonlyMap<MoveId, ReadonlySet<MoveId>>;

export type CompletedSpecs = ReadonlyMap<MoveId, CompletedRelationSpec>;

/**
 * Records, for each move, which newly declared moves mention it under
 * `beats` or `losesTo`. Runs over caller declarations only, before any
 * inherited relation is applied.
 */
export function collectRelationClaims(specs: ReadonlyMap<MoveId, RelationSpec>): RelationClaims {
  const claims = new Map<MoveId, Set<MoveId>>();
  for (const [claimant, spec] of specs) {
    for (const [target] of [...(spec.beats ?? []), ...(spec.losesTo ?? [])]) {
      const subject = toMoveId(target);
      const claimants = claims.get(subject) ?? new Set<MoveId>();
      claimants.add(claimant);
      claims.set(subject, claimants);
    }
  }
  return claims;
}

/**
 * Completes every surviving move's spec. Caller-declared moves come first in
 * declaration order, followed by retained previous moves the caller did not
 * mention. Retained moves inherit any field the caller left out; new and
 * freshly redeclared moves get defaults.
 *
 * An inherited relation between M and T is dropped when T is no longer a
 * retained move, when T's new spec mentions M, or when T declared the
 * matching direction explicitly (T's list is then complete).
 */
export function carryForwardLegacyMoves(
  normalized: NormalizedDeclarations,
  previous: RuleSet,
): StageResult<CompletedSpecs> {
  const diagnostics: Diagnostic[] = [];
  const { specs, retained } = normalized;
  const retainedSet = new Set(retained);
  const claims = collectRelationClaims(specs);
  const completed = new Map<MoveId, CompletedRelationSpec>();

  const isSuperseded = (subject: MoveId, other: MoveId, otherExplicitKey: 'beats' | 'losesTo', path: string): boolean => {
    if (!retainedSet.has(other)) {
      return true;
    }
    const claimed = claims.get(subject)?.has(other) ?? false;
    const explicit = specs.get(other)?.[otherExplicitKey] !== undefined;
    if (!claimed && !explicit) {
      return false;
    }
    diagnostics.push({
      code: RPS_COMPILER_DIAGNOSTIC_CODES.RPS_COMPILER_LEGACY_RELATION_SUPERSEDED,
      path,
      severity: 'info',
      message: claimed
        ? `Inherited relation between ${subject} and ${other} dropped; ${other} declares it anew.`
        : `Inherited relation between ${subject} and ${other} dropped; ${other} declares its ${otherExplicitKey} list explicitly.`,
      moveId: subject,
    });
    return true;
  };

  const inheritBeats = (id: MoveId): readonly RelationEntry[] =>
    [...(previous.hierarchy.get(id) ?? [])]
      .filter((loser) => !isSuperseded(id, loser, 'losesTo', `moves.${id}.beats`))
      .map((loser) => withVerb(loser, lookupVerb(previous.verbs, id, loser)));

  const inheritLosesTo = (id: MoveId): readonly RelationEntry[] =>
    previous.moves
      .filter((winner) => previous.hierarchy.get(winner.id)?.has(id) ?? false)
      .filter((winner) => !isSuperseded(id, winner.id, 'beats', `moves.${id}.losesTo`))
      .map((winner) => withVerb(winner.id, lookupVerb(previous.verbs, winner.id, id)));

  const finalNames = [...specs.keys(), ...retained.filter((id) => !specs.has(id))];
  for (const id of finalNames) {
    const spec = specs.get(id) ?? {};
    const previousMove = retainedSet.has(id) ? getMove(previous, id) : undefined;

    if (previousMove === undefined) {
      completed.set(id, {
        string: spec.string ?? id.toLowerCase(),
        inputString: spec.inputString ?? id.charAt(0),
        beats: spec.beats ?? [],
        losesTo: spec.losesTo ?? [],
      });
      continue;
    }

    completed.set(id, {
      string: spec.string ?? previousMove.display,
      inputString: spec.inputString ?? previousMove.input,
      beats: spec.beats ?? inheritBeats(id),
      losesTo: spec.losesTo ?? inheritLosesTo(id),
    });
  }

  return { value: completed, diagnostics };
}

const withVerb = (target: MoveId, verb: string | undefined): RelationEntry =>
  verb === undefined ? [target] : [target, verb];
