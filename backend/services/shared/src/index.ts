// backend/services/shared/src/index.ts
export * from "./http/HttpResult";
export * from "./http/RequestBody";
export * from "./http/RequestContext";
export * from "./http/expressAdapter";
export * from "./pipeline/Pipeline";
export * from "./middleware/errorHandling";
export * from "./middleware/authentication";
export * from "./middleware/requestLogging";
export * from "./middleware/httpLogger";
export * from "./middleware/problemJson";
export * from "./app/createServiceApp";
export * from "./bootstrap/startHttpService";
export * from "./health";
export * from "./env";
export * from "./utils/logger";
