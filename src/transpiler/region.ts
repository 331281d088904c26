import { TranspileError } from './errors';
import { spansLines, translatePattern } from './regex-dialect';
import type { Binding, MatchingRule, OutputLine, Rule } from './types';

type PushRule = Extract<Rule, { kind: 'push' }>;
type PopRule = Extract<Rule, { kind: 'pop' }>;

export interface RegionPartition {
  push: PushRule[];
  pop: PopRule[];
  other: Rule[];
}

export function partitionRegion(rules: readonly Rule[]): RegionPartition {
  const partition: RegionPartition = { push: [], pop: [], other: [] };
  for (const rule of rules) {
    if (rule.kind === 'push') partition.push.push(rule);
    else if (rule.kind === 'pop') partition.pop.push(rule);
    else partition.other.push(rule);
  }
  return partition;
}

/**
 * Every delimiter pattern goes through the translator, so a lone one loses its
 * anchor and gets the dialect rewrites too; it is just not wrapped in a group.
 * Several become an alternation of groups.
 */
export function delimiterPattern(rules: readonly MatchingRule[]): string {
  const patterns = rules.map((rule) => translatePattern(rule.pattern));
  return patterns.length === 1 ? patterns[0] : `(${patterns.join(')|(')})`;
}

/**
 * Compiles a state that re-enters itself on a delimiter into one nested
 * delimiter region. The remaining rules of the state, if any, are translated
 * through `translateInner` one level deeper and wrapped in a block.
 */
export function compileRegion(
  state: string,
  rules: readonly Rule[],
  depth: number,
  translateInner: (rules: readonly Rule[], depth: number) => OutputLine[]
): OutputLine[] {
  const { push, pop, other } = partitionRegion(rules);
  if (push.length === 0 || pop.length === 0) {
    throw new TranspileError(
      'UnrecognizedRuleShape',
      `a nested region needs both an entering and an exiting rule (found ${push.length} and ${pop.length})`,
      { state }
    );
  }

  const first = push[0];
  if (first.token.kind !== 'literal') {
    throw new TranspileError('UnsupportedTokenSpec', 'a nested region must bind a single token', {
      state,
      pattern: first.pattern,
    });
  }

  const enter = delimiterPattern(push);
  const exit = delimiterPattern(pop);
  const binding: Binding = {
    kind: 'delim',
    token: first.token.token,
    enter,
    exit,
    multiline: spansLines(enter) || spansLines(exit),
  };

  if (other.length === 0) {
    return [{ kind: 'rule', depth, binding }];
  }
  return [
    { kind: 'comment', depth, text: `nested ${state} state` },
    { kind: 'open', depth, binding },
    ...translateInner(other, depth + 1),
    { kind: 'close', depth },
  ];
}
