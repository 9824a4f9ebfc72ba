/**
 * LiteralsMixin: Scalar and Collection Literals
 *
 * Elements and hashmap entries evaluate left to right; a hashmap entry
 * evaluates its key before its value.
 *
 * @internal
 */

import type { LiteralNode } from '../../../../types.js';
import type { TernValue } from '../../values.js';
import {
  array,
  bool,
  float,
  hashmap,
  integer,
  string,
  tuple,
} from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function LiteralsMixin(Base: EvaluatorConstructor): EvaluatorConstructor {
  return class LiteralsEvaluator extends Base {
    protected override evaluateLiteral(node: LiteralNode): TernValue {
      switch (node.type) {
        case 'IntegerLiteral':
          return integer(node.value, this.getNodeLocation(node));
        case 'FloatLiteral':
          return float(node.value);
        case 'BoolLiteral':
          return bool(node.value);
        case 'StringLiteral':
          return string(node.value);
        case 'ArrayLiteral':
          return array(node.elements.map((e) => this.evaluateExpression(e)));
        case 'TupleLiteral':
          return tuple(node.elements.map((e) => this.evaluateExpression(e)));
        case 'HashMapLiteral':
          return hashmap(
            node.entries.map((entry): [TernValue, TernValue] => {
              const key = this.evaluateExpression(entry.key);
              const value = this.evaluateExpression(entry.value);
              return [key, value];
            })
          );
      }
    }
  };
}
