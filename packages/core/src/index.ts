export * from "./models/common";
export * from "./models/timeline";
export * from "./api/types";
export * from "./api/endpoints";
