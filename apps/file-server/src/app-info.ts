export const APP_NAME = "file-serve";
export const APP_VERSION = "0.1.0";
