/**
 * Shared mixin typing
 *
 * @internal
 */

import type { RuntimeContext } from '../types.js';
import type { EvaluatorBase } from './base.js';

/**
 * Constructor every mixin accepts and returns.
 * Mixins override the stubs declared on EvaluatorBase, so the composed
 * class keeps the base's instance shape.
 */
export type EvaluatorConstructor = new (ctx: RuntimeContext) => EvaluatorBase;
