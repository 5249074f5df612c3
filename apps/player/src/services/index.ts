export { OrderIdSequence } from "./order-id-sequence";
export { OrderTracker } from "./order-tracker";
export { PositionTracker } from "./position-tracker";
export { MessageFactory } from "./message-factory";
export { paramsFromEnv, parseTickerList } from "./params-config";
