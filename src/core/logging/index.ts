export * from "./interfaces/logging.interface";
export * from "./logging.module";
export * from "./services/logging.service";
