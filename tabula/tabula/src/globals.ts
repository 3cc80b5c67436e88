const ACCESS_TOKENS = ["public", "protected", "private"] as const;
const MODIFIER_TOKENS = [...ACCESS_TOKENS, "const", "reference", "instance", "nonmethod", "operator"] as const;
const OPERATOR_HOOKS = [
  "add",
  "sub",
  "mul",
  "div",
  "mod",
  "pow",
  "unm",
  "concat",
  "len",
  "eq",
  "lt",
  "le",
  "call",
  "tostring"
] as const;

export type AccessToken = (typeof ACCESS_TOKENS)[number];
export type ModifierToken = (typeof MODIFIER_TOKENS)[number];
export type OperatorHook = (typeof OPERATOR_HOOKS)[number];

export const accessTokens: ReadonlySet<string> = new Set(ACCESS_TOKENS);
export const modifierTokens: ReadonlySet<string> = new Set(MODIFIER_TOKENS);
export const operatorHooks: ReadonlySet<string> = new Set(OPERATOR_HOOKS);

export const isAccessToken = (token: string): token is AccessToken => accessTokens.has(token);
export const isModifierToken = (token: string): token is ModifierToken => modifierTokens.has(token);
export const isOperatorHook = (name: string): name is OperatorHook => operatorHooks.has(name);

/** constructor marker that runs every direct parent's constructor */
export const INHERIT_CONSTRUCTOR = "inherit";
export const OPERATOR_PREFIX = "__";
