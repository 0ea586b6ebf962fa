export const DEFAULT_QUOTE_TIMEOUT_MS = 10_000;

export const UNISWAP_V2_ROUTER_ABI = [
  'function getAmountsOut(uint256 amountIn, address[] path) view returns (uint256[] amounts)',
];

export const RPC_PROVIDER = Symbol('RPC_PROVIDER');
export const ROUTER_TRANSPORT = Symbol('ROUTER_TRANSPORT');
