export { createVerifyCommand, verifyRequest, type VerifyOptions, type VerifyResult } from "./verify.js";
export { createCheckCommand, defaultRequestFor, type CheckOptions } from "./check.js";
