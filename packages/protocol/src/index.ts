export type * from "./channel.js";
export type * from "./messages.js";
export type * from "./commands.js";
export type * from "./events.js";
