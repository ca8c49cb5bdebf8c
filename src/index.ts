import "reflect-metadata";

export * from "./modules/tembo";
export * from "./modules/config";
