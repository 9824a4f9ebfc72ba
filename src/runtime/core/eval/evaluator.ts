/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Foundation utilities and entry point stubs
 * 2. CoreMixin - Statement and expression dispatch, blocks
 * 3. LiteralsMixin - Scalar and collection literals
 * 4. VariablesMixin - Lookup, assignment, declarations, del
 * 5. ExpressionsMixin - Binary and unary operators
 * 6. ControlFlowMixin - if, while, loop, for
 * 7. ClosuresMixin - fn declarations, calls, dot access
 * 8. ModulesMixin - Imports
 *
 * Every stub on EvaluatorBase is overridden by exactly one mixin, so the
 * order only matters for readability.
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { CoreMixin } from './mixins/core.js';
import { LiteralsMixin } from './mixins/literals.js';
import { VariablesMixin } from './mixins/variables.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import { ControlFlowMixin } from './mixins/control-flow.js';
import { ClosuresMixin } from './mixins/closures.js';
import { ModulesMixin } from './mixins/modules.js';
import type { RuntimeContext } from '../types.js';

/**
 * Complete Evaluator class composed from all mixins.
 */
export const Evaluator = ModulesMixin(
  ClosuresMixin(
    ControlFlowMixin(
      ExpressionsMixin(
        VariablesMixin(LiteralsMixin(CoreMixin(EvaluatorBase)))
      )
    )
  )
);

/**
 * WeakMap cache for evaluator instances.
 *
 * Key: RuntimeContext object reference
 * Value: Evaluator instance for that context
 */
const evaluatorCache = new WeakMap<RuntimeContext, EvaluatorBase>();

/**
 * Get or create an evaluator instance for a given RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): EvaluatorBase {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
