/** Framework exports the generated code refers to. */
export interface ExternalSymbol {
  readonly moduleName: string;
  readonly name: string;
}

export const CORE_MODULE = "@angular/core";
export const ANIMATIONS_MODULE = "@angular/animations";

export const RuntimeSymbols = {
  TemplateRef: { moduleName: CORE_MODULE, name: "TemplateRef" },
  AnimationEvent: { moduleName: ANIMATIONS_MODULE, name: "AnimationEvent" },
  InputSignalBrandWriteType: { moduleName: CORE_MODULE, name: "ɵINPUT_SIGNAL_BRAND_WRITE_TYPE" },
  UnwrapWritableSignal: { moduleName: CORE_MODULE, name: "ɵunwrapWritableSignal" },
} as const satisfies Record<string, ExternalSymbol>;

/** Attribute names whose DOM property is spelled differently. */
export const ATTR_TO_PROP: ReadonlyMap<string, string> = new Map([
  ["class", "className"],
  ["for", "htmlFor"],
  ["formaction", "formAction"],
  ["innerHtml", "innerHTML"],
  ["readonly", "readOnly"],
  ["tabindex", "tabIndex"],
]);
