import {
  concat,
  encodeAbiParameters,
  keccak256,
  parseAbiParameters,
  recoverTypedDataAddress,
  size,
  toHex,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { DEFAULTS, ParseError, type Address, type Hex } from "@erc20kit/shared";
import type { MintRequest } from "./voucher.js";

export const MINT_REQUEST_TYPES = {
  MintRequest: [
    { name: "to", type: "address" },
    { name: "primarySaleRecipient", type: "address" },
    { name: "quantity", type: "uint256" },
    { name: "price", type: "uint256" },
    { name: "currency", type: "address" },
    { name: "validityStartTimestamp", type: "uint128" },
    { name: "validityEndTimestamp", type: "uint128" },
    { name: "uid", type: "bytes32" },
  ],
} as const;

export interface MintRequestDomain {
  name: string;
  version: string;
  chainId: number;
  verifyingContract: Address;
}

const DOMAIN_TYPEHASH = keccak256(
  toHex("EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)"),
);

const MINT_REQUEST_TYPEHASH = keccak256(
  toHex(
    "MintRequest(address to,address primarySaleRecipient,uint256 quantity,uint256 price,address currency,uint128 validityStartTimestamp,uint128 validityEndTimestamp,bytes32 uid)",
  ),
);

const DOMAIN_ENCODING = parseAbiParameters(
  "bytes32 typeHash,bytes32 nameHash,bytes32 versionHash,uint256 chainId,address verifyingContract",
);

const MINT_REQUEST_ENCODING = parseAbiParameters(
  "bytes32 typeHash,address to,address primarySaleRecipient,uint256 quantity,uint256 price,address currency,uint128 validityStartTimestamp,uint128 validityEndTimestamp,bytes32 uid",
);

export function mintRequestDomain(name: string, chainId: number, verifyingContract: Address): MintRequestDomain {
  return { name, version: DEFAULTS.SIGNATURE_VERSION, chainId, verifyingContract };
}

export function mintRequestTypedData(domain: MintRequestDomain, message: MintRequest) {
  return {
    domain,
    types: MINT_REQUEST_TYPES,
    primaryType: "MintRequest" as const,
    message,
  };
}

export type MintRequestTypedData = ReturnType<typeof mintRequestTypedData>;

export function domainSeparator(domain: MintRequestDomain): Hex {
  return keccak256(
    encodeAbiParameters(DOMAIN_ENCODING, [
      DOMAIN_TYPEHASH,
      keccak256(toHex(domain.name)),
      keccak256(toHex(domain.version)),
      BigInt(domain.chainId),
      domain.verifyingContract,
    ]),
  );
}

export function mintRequestStructHash(req: MintRequest): Hex {
  return keccak256(
    encodeAbiParameters(MINT_REQUEST_ENCODING, [
      MINT_REQUEST_TYPEHASH,
      req.to,
      req.primarySaleRecipient,
      req.quantity,
      req.price,
      req.currency,
      req.validityStartTimestamp,
      req.validityEndTimestamp,
      req.uid,
    ]),
  );
}

/** keccak256(0x1901 ‖ domainSeparator ‖ structHash), the value actually signed. */
export function mintRequestDigest(domain: MintRequestDomain, req: MintRequest): Hex {
  return keccak256(concat(["0x1901", domainSeparator(domain), mintRequestStructHash(req)]));
}

export async function signMintRequest(domain: MintRequestDomain, req: MintRequest, privateKey: Hex): Promise<Hex> {
  return privateKeyToAccount(privateKey).signTypedData(mintRequestTypedData(domain, req));
}

export async function recoverMintRequestSigner(
  domain: MintRequestDomain,
  req: MintRequest,
  signature: Hex,
): Promise<Address> {
  if (size(signature) !== 65) {
    throw new ParseError(`signature must be 65 bytes, got ${size(signature)}`);
  }
  try {
    return await recoverTypedDataAddress({ ...mintRequestTypedData(domain, req), signature });
  } catch (err) {
    throw new ParseError("signature could not be recovered", { cause: err });
  }
}
