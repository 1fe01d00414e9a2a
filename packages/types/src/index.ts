export * from "./position";
export * from "./claim";
export * from "./ledger";
