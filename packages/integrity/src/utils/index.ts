export { nowIso } from "./date";
export { generateId, type IdGenerator } from "./id";
export {
  err,
  isErr,
  isOk,
  map,
  mapErr,
  ok,
  type Result,
  unwrap,
} from "./result";
