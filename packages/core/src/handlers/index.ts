export {
  convertHandler,
  writeDocument,
  type ConvertError,
  type ConvertInput,
  type ConvertOutput,
} from "./convert";
export type { HandlerContext } from "./types";
