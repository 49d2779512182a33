export * from "./ajv";
export * from "./assert";
export * from "./error";
export * from "./json";
export * from "./action.schema";
export * from "./artifact";
export * from "./intent";
export * from "./score.schema";
export * from "./checkpoint.schema";
export * from "./sbx/worker-message.schema";
