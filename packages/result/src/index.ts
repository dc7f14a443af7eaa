export { Result, ok, error } from "./result";
export { monadic, monadicAsync } from "./monadic";
export { ResultContractError } from "./errors";
