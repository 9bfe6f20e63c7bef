export { Channel, ChannelClosedError } from "./Channel";
