import { createLogger } from "@longwatch/core";

export const runtimeLogger = createLogger("runtime");
