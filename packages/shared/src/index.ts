export {
    errorMessage,
    extractErrorCode,
    isPlainObject,
    readJsonFile,
    reasonFromCode,
} from "./file-utils.js";
export type { JsonReadResult } from "./file-utils.js";
