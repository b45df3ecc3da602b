/* =============================================================================
 * Type-Checking Configuration
 * =============================================================================
 * Flags read by the type-check block generator. Every flag is fixed for one
 * generation pass.
 *
 * ## Presets
 *
 * | Preset   | What is checked                                                  |
 * |----------|------------------------------------------------------------------|
 * | basic    | Top-level expressions only; template bodies are skipped          |
 * | full     | Template bodies, pipes and non-DOM references; inputs are `any`  |
 * | strict   | Everything: inputs, null-ness, events, guards, safe navigation   |
 *
 * `resolveTypeCheckingConfig` starts from a preset (default `full`) and applies
 * the remaining fields of its input as overrides.
 * ============================================================================= */

/* =============================================================================
 * Configuration Types
 * ============================================================================= */

/** Severity for the content-projection interference check. */
export type ControlFlowPreventingContentProjectionKind = "error" | "warning" | "suppress";

export interface TypeCheckingConfig {
  /** Narrow template contexts with `ngTemplateContextGuard`. */
  applyTemplateContextGuards: boolean;

  /** Descend into `<ng-template>` bodies. */
  checkTemplateBodies: boolean;

  /** When false, bound inputs are cast to `any` before assignment. */
  checkTypeOfInputBindings: boolean;

  /**
   * When false, private/protected/readonly input fields are checked through a
   * temporary of the field type instead of a direct write.
   */
  honorAccessModifiersForInputBindings: boolean;

  /** When false, bound inputs are wrapped in a non-null assertion. */
  strictNullInputBindings: boolean;

  /** Check static attributes that match a directive input. */
  checkTypeOfAttributes: boolean;

  /** Assign unclaimed property bindings into the DOM element. */
  checkTypeOfDomBindings: boolean;

  /** Subscribe to directive outputs so `$event` gets the emitted type. */
  checkTypeOfOutputEvents: boolean;

  /** Type `$event` of animation callbacks as `AnimationEvent`. */
  checkTypeOfAnimationEvents: boolean;

  /** Register DOM listeners through `addEventListener` so `$event` is inferred. */
  checkTypeOfDomEvents: boolean;

  /** When false, references to DOM elements are typed `any`. */
  checkTypeOfDomReferences: boolean;

  /** When false, references to directives and templates are typed `any`. */
  checkTypeOfNonDomReferences: boolean;

  /** When false, pipe calls are cast to `any`. */
  checkTypeOfPipes: boolean;

  /** `a?.b` yields `typeof a!.b | undefined` instead of `any`. */
  strictSafeNavigationTypes: boolean;

  /** Copy the component's type parameters onto the block's `this` type. */
  useContextGenericType: boolean;

  /** When false, array and object literals are cast to `any`. */
  strictLiteralTypes: boolean;

  /**
   * Generate every op, including optional ones nobody references. Needed when
   * a consumer looks up symbols in the block rather than only diagnostics.
   */
  enableTemplateTypeChecker: boolean;

  /** Generic directives may use a type constructor that must be inlined. */
  useInlineTypeConstructors: boolean;

  /** Report when context guards are off and template variables end up `any`. */
  suggestionsForSuboptimalTypeInference: boolean;

  /** Two-way bindings accept `T | WritableSignal<T>`. */
  allowSignalsInTwoWayBindings: boolean;

  controlFlowPreventingContentProjection: ControlFlowPreventingContentProjectionKind;
}

export type TypeCheckingPreset = "basic" | "full" | "strict";

export type TypeCheckingConfigInput = Partial<TypeCheckingConfig> & { preset?: TypeCheckingPreset };

/* =============================================================================
 * Preset Definitions
 * ============================================================================= */

const BASIC: TypeCheckingConfig = {
  applyTemplateContextGuards: false,
  checkTemplateBodies: false,
  checkTypeOfInputBindings: false,
  honorAccessModifiersForInputBindings: false,
  strictNullInputBindings: false,
  checkTypeOfAttributes: false,
  checkTypeOfDomBindings: false,
  checkTypeOfOutputEvents: false,
  checkTypeOfAnimationEvents: false,
  checkTypeOfDomEvents: false,
  checkTypeOfDomReferences: false,
  checkTypeOfNonDomReferences: false,
  checkTypeOfPipes: false,
  strictSafeNavigationTypes: false,
  useContextGenericType: false,
  strictLiteralTypes: false,
  enableTemplateTypeChecker: false,
  useInlineTypeConstructors: true,
  suggestionsForSuboptimalTypeInference: false,
  allowSignalsInTwoWayBindings: true,
  controlFlowPreventingContentProjection: "warning",
};

const FULL: TypeCheckingConfig = {
  ...BASIC,
  checkTemplateBodies: true,
  checkTypeOfNonDomReferences: true,
  checkTypeOfPipes: true,
  strictLiteralTypes: true,
};

const STRICT: TypeCheckingConfig = {
  ...FULL,
  applyTemplateContextGuards: true,
  checkTypeOfInputBindings: true,
  strictNullInputBindings: true,
  checkTypeOfAttributes: true,
  checkTypeOfOutputEvents: true,
  checkTypeOfAnimationEvents: true,
  checkTypeOfDomEvents: true,
  checkTypeOfDomReferences: true,
  strictSafeNavigationTypes: true,
  useContextGenericType: true,
};

export const TYPE_CHECKING_PRESETS: Readonly<Record<TypeCheckingPreset, Readonly<TypeCheckingConfig>>> = {
  basic: BASIC,
  full: FULL,
  strict: STRICT,
};

export const DEFAULT_PRESET: TypeCheckingPreset = "full";

/* =============================================================================
 * Configuration Resolution
 * ============================================================================= */

/**
 * Resolve preset + overrides into a full config.
 *
 * `suggestionsForSuboptimalTypeInference` follows `enableTemplateTypeChecker` on
 * non-strict presets unless set explicitly.
 */
export function resolveTypeCheckingConfig(input: TypeCheckingConfigInput = {}): TypeCheckingConfig {
  const { preset = DEFAULT_PRESET, ...overrides } = input;
  const base = TYPE_CHECKING_PRESETS[preset];
  const config: TypeCheckingConfig = { ...base };
  for (const key of Object.keys(overrides)) {
    if (isConfigKey(key)) assign(config, key, overrides[key]);
  }
  if (input.suggestionsForSuboptimalTypeInference === undefined) {
    config.suggestionsForSuboptimalTypeInference = config.enableTemplateTypeChecker && preset !== "strict";
  }
  return config;
}

function isConfigKey(key: string): key is keyof TypeCheckingConfig {
  return key in BASIC;
}

function assign<K extends keyof TypeCheckingConfig>(
  target: TypeCheckingConfig,
  key: K,
  value: TypeCheckingConfig[K] | undefined,
): void {
  if (value !== undefined) target[key] = value;
}
