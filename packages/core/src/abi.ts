import { parseAbi, type Abi } from "viem";

/**
 * Union of the token (signature mint) and drop (claim) contract surfaces.
 * Widened to `Abi` so calls can be described by name at run time.
 */
export const TOKEN_ABI: Abi = parseAbi([
  "struct MintRequest { address to; address primarySaleRecipient; uint256 quantity; uint256 price; address currency; uint128 validityStartTimestamp; uint128 validityEndTimestamp; bytes32 uid; }",
  "struct ClaimCondition { uint256 startTimestamp; uint256 maxClaimableSupply; uint256 supplyClaimed; uint256 quantityLimitPerWallet; bytes32 merkleRoot; uint256 pricePerToken; address currency; string metadata; }",
  "struct AllowlistProof { bytes32[] proof; uint256 quantityLimitPerWallet; uint256 pricePerToken; address currency; }",
  "function name() view returns (string)",
  "function symbol() view returns (string)",
  "function decimals() view returns (uint8)",
  "function totalSupply() view returns (uint256)",
  "function balanceOf(address account) view returns (uint256)",
  "function allowance(address owner, address spender) view returns (uint256)",
  "function primarySaleRecipient() view returns (address)",
  "function approve(address spender, uint256 amount) returns (bool)",
  "function transfer(address to, uint256 amount) returns (bool)",
  "function transferFrom(address from, address to, uint256 amount) returns (bool)",
  "function burn(uint256 amount)",
  "function mintTo(address to, uint256 amount)",
  "function verify(MintRequest req, bytes signature) view returns (bool success, address signer)",
  "function mintWithSignature(MintRequest req, bytes signature) payable",
  "function getActiveClaimConditionId() view returns (uint256)",
  "function getClaimConditionById(uint256 conditionId) view returns (ClaimCondition condition)",
  "function claim(address receiver, uint256 quantity, address currency, uint256 pricePerToken, AllowlistProof allowlistProof, bytes data) payable",
]);
