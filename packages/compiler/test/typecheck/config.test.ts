import { describe, test, expect } from "vitest";

import {
  DEFAULT_PRESET,
  TYPE_CHECKING_PRESETS,
  resolveTypeCheckingConfig,
} from "@tplcheck/compiler/typecheck/config.js";

describe("type-checking presets", () => {
  test("full is the default preset", () => {
    expect(DEFAULT_PRESET).toBe("full");
    expect(resolveTypeCheckingConfig()).toEqual({
      ...TYPE_CHECKING_PRESETS.full,
      suggestionsForSuboptimalTypeInference: false,
    });
  });

  test("basic checks only top-level expressions", () => {
    const config = resolveTypeCheckingConfig({ preset: "basic" });
    expect(config.checkTemplateBodies).toBe(false);
    expect(config.checkTypeOfInputBindings).toBe(false);
    expect(config.checkTypeOfPipes).toBe(false);
    expect(config.strictLiteralTypes).toBe(false);
    expect(config.useInlineTypeConstructors).toBe(true);
    expect(config.allowSignalsInTwoWayBindings).toBe(true);
    expect(config.controlFlowPreventingContentProjection).toBe("warning");
  });

  test("full adds template bodies, pipes, non-DOM references and literal types", () => {
    const basic = TYPE_CHECKING_PRESETS.basic;
    expect(TYPE_CHECKING_PRESETS.full).toEqual({
      ...basic,
      checkTemplateBodies: true,
      checkTypeOfNonDomReferences: true,
      checkTypeOfPipes: true,
      strictLiteralTypes: true,
    });
  });

  test("strict turns on every input, event and guard check", () => {
    const strict = TYPE_CHECKING_PRESETS.strict;
    expect(strict.applyTemplateContextGuards).toBe(true);
    expect(strict.checkTypeOfInputBindings).toBe(true);
    expect(strict.strictNullInputBindings).toBe(true);
    expect(strict.checkTypeOfAttributes).toBe(true);
    expect(strict.checkTypeOfOutputEvents).toBe(true);
    expect(strict.checkTypeOfAnimationEvents).toBe(true);
    expect(strict.checkTypeOfDomEvents).toBe(true);
    expect(strict.checkTypeOfDomReferences).toBe(true);
    expect(strict.strictSafeNavigationTypes).toBe(true);
    expect(strict.useContextGenericType).toBe(true);
    expect(strict.checkTypeOfDomBindings).toBe(false);
    expect(strict.honorAccessModifiersForInputBindings).toBe(false);
  });

  test("no preset enables the full template type checker", () => {
    for (const preset of ["basic", "full", "strict"] as const) {
      expect(TYPE_CHECKING_PRESETS[preset].enableTemplateTypeChecker).toBe(false);
    }
  });
});

describe("resolveTypeCheckingConfig", () => {
  test("applies overrides on top of the preset", () => {
    const config = resolveTypeCheckingConfig({ preset: "basic", checkTypeOfPipes: true });
    expect(config.checkTypeOfPipes).toBe(true);
    expect(config.checkTemplateBodies).toBe(false);
  });

  test("ignores overrides left undefined", () => {
    const config = resolveTypeCheckingConfig({ preset: "strict", checkTypeOfDomEvents: undefined });
    expect(config.checkTypeOfDomEvents).toBe(true);
  });

  test("suboptimal inference suggestions follow the template type checker outside strict", () => {
    expect(resolveTypeCheckingConfig({ enableTemplateTypeChecker: true }).suggestionsForSuboptimalTypeInference).toBe(true);
    expect(
      resolveTypeCheckingConfig({ preset: "strict", enableTemplateTypeChecker: true }).suggestionsForSuboptimalTypeInference,
    ).toBe(false);
  });

  test("an explicit suggestion flag wins", () => {
    const config = resolveTypeCheckingConfig({
      preset: "strict",
      enableTemplateTypeChecker: true,
      suggestionsForSuboptimalTypeInference: true,
    });
    expect(config.suggestionsForSuboptimalTypeInference).toBe(true);
  });

  test("does not mutate the preset", () => {
    resolveTypeCheckingConfig({ preset: "basic", checkTypeOfPipes: true });
    expect(TYPE_CHECKING_PRESETS.basic.checkTypeOfPipes).toBe(false);
  });
});
