import "reflect-metadata";

export * from "./bootstrap";
export * from "./common/filters/http-exception.filter";
export * from "./common/interfaces/registration-hook.interface";
export * from "./common/validators/is-string-record.validator";
export * from "./config/base.config";
export * from "./core/logging";
export * from "./foundations/stripe";
