export const NAME = "callplan";
export const VERSION = "0.1.0";
