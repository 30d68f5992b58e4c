// src/tables/properties.ts
// Property whitelist shared by the reverse compiler and the validator

export const PROPERTY_WHITELIST: readonly string[] = [
  // audio
  "Volume",
  "Pitch",
  "Lowpass",
  "Highpass",
  // parameters
  "InitialValue",
  "MinValue",
  "MaxValue",
  // overrides
  "OverrideOutput",
  "OverridePositioning",
  "OverrideGameAuxSends",
  // other
  "MakeUpGain",
  "BusVolume",
  "InitialDelay",
  "IsLoopingEnabled",
  "IsLoopingInfinite",
  "Inclusion",
  "Color",
  "Priority",
];

const WHITELIST_SET: ReadonlySet<string> = new Set(PROPERTY_WHITELIST);

export function isWhitelistedProperty(name: string): boolean {
  return WHITELIST_SET.has(name);
}

/** Values the platform assigns when a property is never touched. */
export const PROPERTY_DEFAULTS: Readonly<Record<string, string>> = {
  Volume: "0",
  Pitch: "0",
  Lowpass: "0",
  Highpass: "0",
  InitialValue: "0",
  Priority: "50",
  IsLoopingEnabled: "False",
  Inclusion: "True",
};

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function isDefaultValue(property: string, value: string): boolean {
  const fallback = PROPERTY_DEFAULTS[property];
  if (fallback === undefined) return false;
  if (fallback === value) return true;
  if (NUMERIC.test(fallback) && NUMERIC.test(value)) {
    return Number(fallback) === Number(value);
  }
  return fallback.toLowerCase() === value.toLowerCase();
}
