export { freeIdentifiers, callHeads } from "./collect";
