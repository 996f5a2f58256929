export * from "../../index.js";

export type * from "./file-system/local-file-system.js";
export { default as LocalFileSystem } from "./file-system/local-file-system.js";

export type * from "./setup/create-node-hasher.js";
export { default as createNodeHasher } from "./setup/create-node-hasher.js";

export * from "./sha256.js";
