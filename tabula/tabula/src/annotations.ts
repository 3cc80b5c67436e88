import { DefinitionError } from "./errors";
import {
  type AccessToken,
  isAccessToken,
  isModifierToken,
  isOperatorHook,
  type ModifierToken,
  OPERATOR_PREFIX
} from "./globals";

export type FieldModifiers = {
  readonly access: AccessToken | null;
  readonly isConstant: boolean;
  readonly isSharedReference: boolean;
  readonly isLazyInstance: boolean;
  readonly isNonMethod: boolean;
  readonly isOperator: boolean;
  /** no token at all: the field keeps whatever an ancestor declared */
  readonly isBare: boolean;
};

export type DecodedFieldKey =
  | { readonly kind: "indexed"; readonly index: number }
  | { readonly kind: "named"; readonly name: string; readonly modifiers: FieldModifiers };

const BARE_MODIFIERS: FieldModifiers = Object.freeze({
  access: null,
  isConstant: false,
  isSharedReference: false,
  isLazyInstance: false,
  isNonMethod: false,
  isOperator: false,
  isBare: true
});

const OPERATOR_MODIFIERS: FieldModifiers = Object.freeze({ ...BARE_MODIFIERS, isOperator: true, isBare: false });

const CANONICAL_INDEX = /^(?:0|[1-9]\d*)$/;
// prefix block, a run of two or more underscores, then the name
const ANNOTATED_KEY = /^([^_].*?)_{2,}(.*)$/s;

/** numbers and strings such as "0" or "12" address the exempt, always-public numeric slots */
export function asIndex(key: string | number): number | null {
  if (typeof key === "number") {
    return Number.isSafeInteger(key) && key >= 0 ? key : null;
  }
  if (!CANONICAL_INDEX.test(key)) {
    return null;
  }
  const index = Number(key);
  return Number.isSafeInteger(index) ? index : null;
}

export function decodeFieldKey(rawKey: string | number): DecodedFieldKey {
  const index = asIndex(rawKey);
  if (index !== null) {
    return { kind: "indexed", index };
  }
  if (typeof rawKey !== "string") {
    throw new DefinitionError(`Field key ${String(rawKey)} is neither a field name nor a non-negative integer`);
  }

  // `__add` is the stored form of `operator__add` and may be written directly
  if (rawKey.startsWith(OPERATOR_PREFIX) && isOperatorHook(rawKey.slice(OPERATOR_PREFIX.length))) {
    return { kind: "named", name: rawKey, modifiers: OPERATOR_MODIFIERS };
  }
  const match = ANNOTATED_KEY.exec(rawKey);
  if (!match) {
    return { kind: "named", name: rawKey, modifiers: BARE_MODIFIERS };
  }
  const [, prefixBlock, remainder] = match;
  if (remainder === "") {
    throw new DefinitionError(`Field key '${rawKey}' has modifiers but no field name`);
  }

  const tokens = new Set<ModifierToken>();
  for (const token of prefixBlock.split("_")) {
    if (!isModifierToken(token)) {
      throw new DefinitionError(`Unknown modifier '${token}' in field '${remainder}'`);
    }
    tokens.add(token);
  }
  const accessLevels = [...tokens].filter(isAccessToken);
  if (accessLevels.length > 1) {
    throw new DefinitionError(`Field '${remainder}' is attempting to be ${accessLevels.join(" and ")} at the same time`);
  }
  if (tokens.has("instance") && tokens.has("reference")) {
    throw new DefinitionError(`Field '${remainder}' cannot be both an instance and a reference`);
  }

  let name = remainder;
  if (tokens.has("operator")) {
    if (!isOperatorHook(remainder)) {
      throw new DefinitionError(`Unknown operator '${remainder}'`);
    }
    name = `${OPERATOR_PREFIX}${remainder}`;
  }

  return {
    kind: "named",
    name,
    modifiers: {
      access: accessLevels[0] ?? null,
      isConstant: tokens.has("const"),
      isSharedReference: tokens.has("reference"),
      isLazyInstance: tokens.has("instance"),
      isNonMethod: tokens.has("nonmethod"),
      isOperator: tokens.has("operator"),
      isBare: false
    }
  };
}
