export { default as log } from "loglevel";
export type { Logger } from "loglevel";
