import { BaseError, decodeFunctionData, parseAbi, size, slice, toFunctionSelector, type Address, type Hex } from 'viem';
import { WalletModuleError } from '../errors';
import { assertNever } from '../relay/operations';

/**
 * Token methods whose call data names the party receiving value or allowance
 */
export const SPENDER_METHODS_ABI = parseAbi([
  'function transfer(address to, uint256 amount)',
  'function approve(address spender, uint256 amount)',
  'function setApprovalForAll(address operator, bool approved)',
  'function transferFrom(address from, address to, uint256 tokenId)',
  'function safeTransferFrom(address from, address to, uint256 tokenId)',
  'function safeTransferFrom(address from, address to, uint256 tokenId, bytes data)',
  'function safeTransferFrom(address from, address to, uint256 id, uint256 amount, bytes data)',
]);

const SPENDER_SELECTORS = new Set<string>(SPENDER_METHODS_ABI.map((item) => toFunctionSelector(item)));

function decodeSpenderCall(data: Hex) {
  try {
    return decodeFunctionData({ abi: SPENDER_METHODS_ABI, data });
  } catch (error) {
    if (error instanceof BaseError) {
      throw new WalletModuleError('MALFORMED_CALL_DATA', `Malformed token call: ${error.shortMessage}`, { data });
    }
    throw error;
  }
}

/**
 * Effective spender of a call: the address encoded in a recognised token
 * method, otherwise the call target itself. A recognised method whose
 * arguments do not decode is rejected.
 */
export function recoverSpender(to: Address, data: Hex): Address {
  if (size(data) < 4 || !SPENDER_SELECTORS.has(slice(data, 0, 4).toLowerCase())) {
    return to;
  }
  const decoded = decodeSpenderCall(data);
  switch (decoded.functionName) {
    case 'transfer':
    case 'approve':
    case 'setApprovalForAll':
      return decoded.args[0];
    case 'transferFrom':
    case 'safeTransferFrom':
      return decoded.args[1];
    default:
      return assertNever(decoded);
  }
}
