export const TOKEN_MANAGER_MODULE_OPTIONS = Symbol("TOKEN_MANAGER_MODULE_OPTIONS");
export const TOKEN_MANAGER = Symbol("TOKEN_MANAGER");
export const REQUIRED_SCOPES_KEY = "tokenward:required-scopes";
