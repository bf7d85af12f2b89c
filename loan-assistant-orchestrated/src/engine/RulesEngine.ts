import { logger } from '../utils/logger';

export interface Rule<TContext, TResult> {
    name: string;
    condition: (context: TContext) => boolean;
    action: (context: TContext) => TResult;
}

/**
 * First-match rule table: rules are tried in order and the first whose
 * condition holds produces the result.
 */
export class RulesEngine<TContext, TResult> {
    private rules: Rule<TContext, TResult>[] = [];
    private fallback: (context: TContext) => TResult;

    constructor(rules: Rule<TContext, TResult>[], fallback: (context: TContext) => TResult) {
        this.rules = rules;
        this.fallback = fallback;
    }

    evaluate(context: TContext): TResult {
        for (const rule of this.rules) {
            if (rule.condition(context)) {
                logger.debug('Rule matched', { rule: rule.name });
                return rule.action(context);
            }
        }
        return this.fallback(context);
    }
}
