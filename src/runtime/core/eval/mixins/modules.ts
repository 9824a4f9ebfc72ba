/**
 * ModulesMixin: Imports
 *
 * `import "name" as alias` binds a fresh record from a built-in module.
 * Any other path names a file, resolved against the importing module's
 * directory. A file runs once per importing module, in its own scope
 * under the shared prelude; its bindings become the record. A file whose
 * import failed is not marked loaded.
 *
 * @internal
 */

import * as path from 'node:path';
import type { ImportNode } from '../../../../types.js';
import { RuntimeError } from '../../../../types.js';
import {
  createModuleContext,
  defineVariable,
  flattenVariables,
} from '../../context.js';
import {
  circularImportError,
  loadModuleAst,
  resolveModulePath,
} from '../../module-loader.js';
import type { ControlFlow } from '../../signals.js';
import { COMPLETED } from '../../signals.js';
import type { HashMapValue, TernValue } from '../../values.js';
import { hashmap, string } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import { redeclaredVariable } from './variables.js';

/**
 * Record the module file on a runtime error raised while it runs.
 * The innermost module wins.
 */
function withModulePath(err: unknown, modulePath: string): unknown {
  if (
    !(err instanceof RuntimeError) ||
    err.context?.['modulePath'] !== undefined
  ) {
    return err;
  }
  return new RuntimeError(err.code, err.toData().message, err.location, {
    ...err.context,
    modulePath,
  });
}

export function ModulesMixin(Base: EvaluatorConstructor): EvaluatorConstructor {
  return class ModulesEvaluator extends Base {
    protected override executeImport(node: ImportNode): ControlFlow {
      const factory = this.ctx.moduleState.builtinModules.get(node.path);
      if (factory) {
        this.bindModule(node, factory());
        return COMPLETED;
      }

      const { moduleState } = this.ctx;
      const location = this.getNodeLocation(node);
      const canonicalPath = resolveModulePath(
        moduleState.basePath,
        node.path,
        location
      );

      if (moduleState.loaded.has(canonicalPath)) {
        return COMPLETED;
      }
      if (moduleState.chain.has(canonicalPath)) {
        throw circularImportError(
          moduleState.chain,
          canonicalPath,
          node.path,
          location
        );
      }

      const ast = loadModuleAst(canonicalPath, node.path, location);
      const moduleCtx = createModuleContext(
        this.ctx,
        path.dirname(canonicalPath)
      );
      moduleState.chain.add(canonicalPath);
      try {
        this.withContext(moduleCtx, () => this.executeBlock(ast.statements));
      } catch (err) {
        throw withModulePath(err, canonicalPath);
      } finally {
        moduleState.chain.delete(canonicalPath);
      }

      const entries = [...flattenVariables(moduleCtx)].map(
        ([name, value]): [TernValue, TernValue] => [string(name), value]
      );
      this.bindModule(node, hashmap(entries));
      // Only a completed import counts; a failed one may be retried
      moduleState.loaded.add(canonicalPath);
      return COMPLETED;
    }

    private bindModule(node: ImportNode, record: HashMapValue): void {
      if (!defineVariable(this.ctx, node.alias, record, false)) {
        throw redeclaredVariable(node.alias, node);
      }
    }
  };
}
