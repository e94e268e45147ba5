export * as extraction from "./extraction"
export * as correction from "./correction"
export * as nli from "./nli"
