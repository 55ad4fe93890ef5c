export * from "./artifacts";
export * from "./enterprise_input";
export * from "./report_package";
