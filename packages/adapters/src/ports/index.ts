export { isRetryableGatewayError } from "./exchange-gateway-port";
export type {
  ExchangeGateway,
  Execution,
  GatewayError,
  InstrumentInfo,
  OpenOrder,
  OrderSide,
  PlaceOrderRequest,
  PlaceOrderResponse,
  PositionInfo,
  Ticker,
  WalletBalance,
} from "./exchange-gateway-port";
