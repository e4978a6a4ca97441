export * from "./commands";
export * from "./dispatch";
export * from "./WsGateway";
