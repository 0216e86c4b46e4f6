export * from "./models/common";
export * from "./models/rides";
export * from "./models/dashboard";
export * from "./api/types";
export * from "./api/endpoints";
