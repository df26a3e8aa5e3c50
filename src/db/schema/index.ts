export * from "./topup-purchases.js";
export * from "./usage-records.js";
