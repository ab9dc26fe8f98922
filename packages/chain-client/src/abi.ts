/**
 * Contract fragments the client calls.
 */

import { parseAbi } from "viem";

export const TRADE_ABI = parseAbi([
  "function multiSwap(bytes[] data)",
  "function aaveWithdraw(address asset, uint256 amount)",
  "function getAavePositionSizes(address[] assets) view returns (uint256[])",
]);

export const FEEDER_ABI = parseAbi([
  "function userWaitingForWithdrawal(uint256 fundId) view returns (address[])",
  "function getUserData(uint256 fundId, address user) view returns (uint256 totalDeposit, uint256 totalWithdrawals, uint256 tokenAmount, uint256 pendingWithdrawalTokens)",
]);

export const INTERACTION_ABI = parseAbi([
  "function withdrawMultiple(uint256 fundId, address[] users, uint256 tradeTvl)",
]);

export const GMX_READER_ABI = parseAbi([
  "function getPositions(address vault, address account, address[] collateralTokens, address[] indexTokens, bool[] isLong) view returns (uint256[])",
]);

// Arbitrage contract batch entry point, signed by the end user's wallet
export const ARBITRAGE_ABI = parseAbi([
  "function multiSwap(address token, uint256 amount, address[] targets, bytes[] data)",
]);
