export class ResultContractError extends Error {
  constructor(message = "Result cannot be both ok and error") {
    super(message);
    this.name = "ResultContractError";
  }
}
