export const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000" as const;

/** Sentinel currency address meaning "the chain's native token". */
export const NATIVE_TOKEN_ADDRESS = "0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE" as const;

export const DEFAULTS = {
  VOUCHER_DECIMALS: 18,
  CURRENCY_DECIMALS: 18,
  DISPLAY_DECIMALS: 4,
  SIGNATURE_VERSION: "1",
  MINT_VALIDITY_YEARS: 10,
  PORT: 4520,
} as const;

export const ROUTES = {
  ERC20: "erc20",
  CLAIM_CONDITIONS: "claimConditions",
  SIGNATURE: "signature",
  WALLET: "sdk.wallet",
} as const;

export const HEADERS = {
  REQUEST_ID: "x-bridge-request-id",
} as const;
