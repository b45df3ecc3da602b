/* =======================================================================================
 * DIRECTIVE / PIPE METADATA
 * ---------------------------------------------------------------------------------------
 * What the binder matches against templates and what the type-check block generator
 * needs to type a directive instance. Supplied by the caller (a metadata extractor,
 * a registry, a test).
 * ======================================================================================= */

/** A class the generated code can name: a bare identifier, or an export of `moduleName`. */
export interface TypeReference {
  name: string;
  moduleName?: string;
}

export interface TypeParameterMeta {
  name: string;
  /** Constraint written as type text, e.g. `string | number`. */
  bound?: string;
}

export interface InputMeta {
  /** Name used in templates (`[name]`). */
  bindingPropertyName: string;
  /** Backing field; null when the input has no field to write. */
  classPropertyName: string | null;
  required: boolean;
  /** Input declared as a signal; writes go through the signal brand. */
  isSignal: boolean;
  /** Declared write type of a transformed input. */
  transformType: string | null;
  /** Has a static `ngAcceptInputType_<field>` member. */
  isCoerced: boolean;
  /** Field is private, protected or readonly. */
  isRestricted: boolean;
}

export interface OutputMeta {
  bindingPropertyName: string;
  classPropertyName: string;
}

/**
 * `binding`: the bound expression itself narrows the template body.
 * `invocation`: a static `ngTemplateGuard_<input>` method narrows it.
 */
export type TemplateGuardType = "binding" | "invocation";

export interface TemplateGuardMeta {
  inputName: string;
  type: TemplateGuardType;
}

export interface DirectiveMeta {
  name: string;
  selector: string | null;
  isComponent: boolean;
  exportAs: readonly string[] | null;
  inputs: readonly InputMeta[];
  outputs: readonly OutputMeta[];
  isGeneric: boolean;
  typeParameters: readonly TypeParameterMeta[];
  /** Generic whose type constructor cannot be hoisted into the environment. */
  requiresInlineTypeCtor: boolean;
  templateGuards: readonly TemplateGuardMeta[];
  hasTemplateContextGuard: boolean;
  ngContentSelectors: readonly string[] | null;
  isExplicitlyDeferred: boolean;
  /** Null when the class is not addressable; the instance is then typed `any`. */
  ref: TypeReference | null;
}

export interface PipeMeta {
  name: string;
  ref: TypeReference;
  isExplicitlyDeferred: boolean;
}

export interface ComponentMeta {
  name: string;
  typeParameters: readonly TypeParameterMeta[];
  ref: TypeReference;
}

export function inputOf(dir: DirectiveMeta, bindingName: string): InputMeta | null {
  return dir.inputs.find((i) => i.bindingPropertyName === bindingName) ?? null;
}

export function outputOf(dir: DirectiveMeta, bindingName: string): OutputMeta | null {
  return dir.outputs.find((o) => o.bindingPropertyName === bindingName) ?? null;
}

export function hasInput(dir: DirectiveMeta, bindingName: string): boolean {
  return inputOf(dir, bindingName) !== null;
}

export function hasOutput(dir: DirectiveMeta, bindingName: string): boolean {
  return outputOf(dir, bindingName) !== null;
}

export type DirectiveMetaInit = Pick<DirectiveMeta, "name"> & Partial<Omit<DirectiveMeta, "inputs" | "outputs">> & {
  inputs?: readonly (string | (Pick<InputMeta, "bindingPropertyName"> & Partial<InputMeta>))[];
  outputs?: readonly (string | OutputMeta)[];
};

/**
 * Fill defaults for a directive description. String inputs/outputs map a binding name
 * onto a field of the same name.
 */
export function defineDirective(init: DirectiveMetaInit): DirectiveMeta {
  const typeParameters = init.typeParameters ?? [];
  return {
    name: init.name,
    selector: init.selector ?? null,
    isComponent: init.isComponent ?? false,
    exportAs: init.exportAs ?? null,
    inputs: (init.inputs ?? []).map(normalizeInput),
    outputs: (init.outputs ?? []).map((o) =>
      typeof o === "string" ? { bindingPropertyName: o, classPropertyName: o } : o,
    ),
    isGeneric: init.isGeneric ?? typeParameters.length > 0,
    typeParameters,
    requiresInlineTypeCtor: init.requiresInlineTypeCtor ?? false,
    templateGuards: init.templateGuards ?? [],
    hasTemplateContextGuard: init.hasTemplateContextGuard ?? false,
    ngContentSelectors: init.ngContentSelectors ?? null,
    isExplicitlyDeferred: init.isExplicitlyDeferred ?? false,
    ref: init.ref === undefined ? { name: init.name } : init.ref,
  };
}

function normalizeInput(input: string | (Pick<InputMeta, "bindingPropertyName"> & Partial<InputMeta>)): InputMeta {
  if (typeof input === "string") {
    return {
      bindingPropertyName: input,
      classPropertyName: input,
      required: false,
      isSignal: false,
      transformType: null,
      isCoerced: false,
      isRestricted: false,
    };
  }
  return {
    bindingPropertyName: input.bindingPropertyName,
    classPropertyName: input.classPropertyName === undefined ? input.bindingPropertyName : input.classPropertyName,
    required: input.required ?? false,
    isSignal: input.isSignal ?? false,
    transformType: input.transformType ?? null,
    isCoerced: input.isCoerced ?? false,
    isRestricted: input.isRestricted ?? false,
  };
}

export function definePipe(init: Pick<PipeMeta, "name"> & Partial<PipeMeta> & { className?: string }): PipeMeta {
  return {
    name: init.name,
    ref: init.ref ?? { name: init.className ?? init.name },
    isExplicitlyDeferred: init.isExplicitlyDeferred ?? false,
  };
}
