export {EventServer} from "./server";
export type {BroadcastOptions, MessageHandler} from "./server";
