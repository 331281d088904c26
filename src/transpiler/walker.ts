import type { TranslationContext } from './context';
import { TranspileError, isTranspileError } from './errors';
import { compileRegion } from './region';
import { resolveBinding } from './resolver';
import { ROOT_STATE, type Binding, type OutputLine, type Rule, type TokenSpec } from './types';

function unreachable(rule: never): never {
  throw new TranspileError('UnrecognizedRuleShape', `cannot interpret rule ${JSON.stringify(rule)}`);
}

/**
 * Walks a lexer graph from its root state and emits destination lines.
 * Includes splice the target state in place; nested transitions open a block
 * one level deeper. Every translated rule list counts against `maxDepth`.
 */
export class StateWalker {
  private frames = 0;

  constructor(private readonly ctx: TranslationContext) {}

  walk(state: string = ROOT_STATE, depth: number = 0): OutputLine[] {
    return this.translateRules(state, this.ctx.rulesOf(state), depth);
  }

  private enterFrame(state: string): void {
    if (++this.frames > this.ctx.limits.maxDepth) {
      throw new TranspileError(
        'RecursionLimitExceeded',
        `more than ${this.ctx.limits.maxDepth} nested state translations`,
        { state }
      );
    }
  }

  private resolve(state: string, pattern: string, token: TokenSpec, pops: boolean): Binding | null {
    try {
      return resolveBinding(pattern, token, this.ctx, pops);
    } catch (error: unknown) {
      if (isTranspileError(error)) error.withContext({ state, pattern });
      throw error;
    }
  }

  private translateRules(state: string, rules: readonly Rule[], depth: number): OutputLine[] {
    this.enterFrame(state);
    try {
      const lines: OutputLine[] = [];
      const hasRegion = rules.some((rule) => rule.kind === 'push');
      let regionEmitted = false;

      for (const rule of rules) {
        switch (rule.kind) {
          case 'include':
            lines.push(...this.walk(rule.target, depth));
            break;

          case 'literal': {
            const binding = this.resolve(state, rule.pattern, rule.token, false);
            if (binding) lines.push({ kind: 'rule', depth, binding });
            break;
          }

          case 'nested': {
            const binding = this.resolve(state, rule.pattern, rule.token, false);
            if (binding === null) {
              lines.push(...this.walk(rule.target, depth));
              break;
            }
            lines.push(
              { kind: 'comment', depth, text: `${rule.target} state` },
              { kind: 'open', depth, binding },
              ...this.walk(rule.target, depth + 1),
              { kind: 'close', depth }
            );
            break;
          }

          case 'push':
            if (!regionEmitted) {
              regionEmitted = true;
              lines.push(
                ...compileRegion(state, rules, depth, (inner, innerDepth) =>
                  this.translateRules(state, inner, innerDepth)
                )
              );
            }
            break;

          case 'pop': {
            if (hasRegion) break;
            const binding = this.resolve(state, rule.pattern, rule.token, true);
            if (binding) lines.push({ kind: 'exit', depth, binding, count: rule.count });
            break;
          }

          default:
            unreachable(rule);
        }
      }
      return lines;
    } finally {
      this.frames--;
    }
  }
}
