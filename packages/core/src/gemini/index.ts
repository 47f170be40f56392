export { toGemini, writeGemini } from "./writer";
