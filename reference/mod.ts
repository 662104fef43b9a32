export * from "./hash.ts";
export { PayloadKindError, UnsupportedObjectType } from "./reference.ts";

/** module to hand to `inProcess()` */
export const REFERENCE_MODULE = new URL("./reference.ts", import.meta.url);
