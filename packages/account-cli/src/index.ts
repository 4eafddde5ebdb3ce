export { AccountViewModel, INITIAL_ACCOUNT_VIEW_STATE } from "./view-model/account-view-model.js";
export type {
  AccountGateway,
  AccountViewModelOptions,
  AccountViewState,
  LoginState,
} from "./view-model/account-view-model.js";

export { createAccountsProgram } from "./cli/program.js";
export type { AccountsProgramDependencies, RunningServer } from "./cli/program.js";
export { createRuntimeDependencies } from "./runtime.js";
