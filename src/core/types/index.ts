export { type Brand, brand } from "./brand.js";
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  tryCatch,
} from "./result.js";
