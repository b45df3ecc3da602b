/* =======================================================================================
 * TCB ENVIRONMENT
 * ---------------------------------------------------------------------------------------
 * Declarations shared by every block generated in one pass: namespace imports for
 * framework symbols, hoisted type constructors of generic directives and one typed
 * instance per pipe. Statements are produced on demand and emitted once, ahead of the
 * block function, by `getPreludeStatements()`.
 * ======================================================================================= */

import type { DirectiveMeta, PipeMeta, TypeReference } from "../model/directive.js";
import type { TypeCheckingConfig } from "../typecheck/config.js";
import { expression, identifier, statement, text, type Expression, type Identifier, type Statement } from "./code.js";
import type { ExternalSymbol } from "./runtime-symbols.js";
import { quote, tsDeclareVariable, typeArgumentList, typeParameterList } from "./ts-util.js";
import { debug } from "../shared/debug.js";

export class Environment {
  private readonly imports = new Map<string, string>();
  private readonly typeCtors = new Map<DirectiveMeta, Identifier>();
  private readonly typeCtorStatements: Statement[] = [];
  private readonly pipeInstances = new Map<string, Identifier>();
  private readonly pipeStatements: Statement[] = [];

  constructor(readonly config: TypeCheckingConfig) {}

  /** Expression naming a class, qualified by its module namespace when it has one. */
  reference(ref: TypeReference): Expression {
    if (!ref.moduleName) return text(ref.name);
    return text(`${this.namespaceOf(ref.moduleName)}.${ref.name}`);
  }

  /** Type written as text, e.g. a declared transform type. */
  referenceType(typeText: string): Expression {
    return text(typeText);
  }

  referenceExternalType(symbol: ExternalSymbol): Expression {
    return text(`${this.namespaceOf(symbol.moduleName)}.${symbol.name}`);
  }

  referenceExternalSymbol(symbol: ExternalSymbol): Expression {
    return text(`${this.namespaceOf(symbol.moduleName)}.${symbol.name}`);
  }

  /**
   * Hoisted constructor inferring a generic directive's type arguments from its inputs:
   * `const _ctor1: <T = any>(init: Pick<Dir<T>, "a">) => Dir<T> = null!;`
   */
  typeCtorFor(dir: DirectiveMeta): Identifier {
    const existing = this.typeCtors.get(dir);
    if (existing) return existing;
    const id = identifier(`_ctor${this.typeCtors.size + 1}`);
    this.typeCtors.set(dir, id);

    const instanceType = dir.ref
      ? `${this.typeText(dir.ref)}${typeArgumentList(dir.typeParameters)}`
      : "any";
    const picked: string[] = [];
    const coerced: string[] = [];
    for (const input of dir.inputs) {
      const field = input.classPropertyName;
      if (field === null || picked.includes(quote(field))) continue;
      if (input.isCoerced && !input.isSignal && dir.ref) {
        const type = input.transformType ?? `typeof ${this.typeText(dir.ref)}.ngAcceptInputType_${field}`;
        coerced.push(`{ ${quote(field)}: ${type} }`);
      }
      picked.push(quote(field));
    }
    const pick = `Pick<${instanceType}, ${picked.length > 0 ? picked.join(" | ") : "never"}>`;
    const initType = [pick, ...coerced].join(" & ");
    const generics = typeParameterList(dir.typeParameters, true);
    this.typeCtorStatements.push(
      statement((b) =>
        b.append("const ").append(id).append(`: ${generics}(init: ${initType}) => ${instanceType} = null!;`),
      ),
    );
    debug.tcb("env.type-ctor", { directive: dir.name, id: id.name });
    return id;
  }

  /** Typed instance of a pipe class: `var _pipe1 = null! as DatePipe;` */
  pipeInst(pipe: PipeMeta): Expression {
    const id = this.pipeInstances.get(pipe.name) ?? this.declarePipe(pipe);
    return expression((b) => b.append(id));
  }

  isExplicitlyDeferred(dir: DirectiveMeta): boolean {
    return dir.isExplicitlyDeferred;
  }

  /** Imports, then type constructors, then pipe instances. */
  getPreludeStatements(): Statement[] {
    const imports = [...this.imports].map(([moduleName, alias]) =>
      statement((b) => b.append(`import * as ${alias} from ${quote(moduleName)};`)),
    );
    return [...imports, ...this.typeCtorStatements, ...this.pipeStatements];
  }

  private declarePipe(pipe: PipeMeta): Identifier {
    const id = identifier(`_pipe${this.pipeInstances.size + 1}`);
    this.pipeInstances.set(pipe.name, id);
    this.pipeStatements.push(tsDeclareVariable(id, this.typeText(pipe.ref)));
    return id;
  }

  private typeText(ref: TypeReference): string {
    return ref.moduleName ? `${this.namespaceOf(ref.moduleName)}.${ref.name}` : ref.name;
  }

  private namespaceOf(moduleName: string): string {
    let alias = this.imports.get(moduleName);
    if (!alias) {
      alias = `_i${this.imports.size}`;
      this.imports.set(moduleName, alias);
    }
    return alias;
  }
}
