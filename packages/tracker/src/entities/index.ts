export * from "./fields.js";
export * from "./company.js";
export * from "./metric.js";
export * from "./product.js";
export * from "./share.js";
