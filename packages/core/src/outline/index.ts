export { codeSpan, escapeDestination, escapeOutline } from "./escape";
export { toOutline, writeOutline } from "./writer";
