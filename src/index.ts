/**
 * Mintlink
 *
 * Builds unsigned token-launch transactions, checks them against a security
 * policy, hands them to wallets as deep links and tracks their confirmation.
 * Keys never enter this library: the user's wallet signs and sends.
 */

// Constants
export {
	SYSTEM_PROGRAM_ID,
	TOKEN_PROGRAM_ID,
	ASSOCIATED_TOKEN_PROGRAM_ID,
	RESERVED_ACCOUNTS,
	MINT_SIZE,
	TOKEN_ACCOUNT_SIZE,
	MAX_TRANSACTION_SIZE,
	MAX_DEEP_LINK_PAYLOAD_LENGTH,
	DEFAULT_RETRY_POLICY,
	DEFAULT_RATE_LIMIT,
	EXPLORER_URLS,
} from "./core/constants.js";

// Metadata validation
export {
	TokenMetadataSchema,
	validateTokenMetadata,
	formatZodError,
	type TokenMetadata,
	type TokenMetadataInput,
	type ValidateMetadataOptions,
} from "./core/schemas.js";

// Errors
export {
	MintlinkError,
	ValidationError,
	InvalidParameterError,
	InsufficientFundsError,
	SecurityRejectionError,
	NetworkTransientError,
	EncodingOverflowError,
	RateLimitedError,
	ConfigError,
	type MintlinkErrorCode,
} from "./errors.js";

// Logging and configuration
export {
	createConsoleLogger,
	silentLogger,
	type Logger,
	type LogLevel,
	type LogContext,
} from "./logger.js";
export { loadConfig, defaultConfig, type MintlinkConfig } from "./config.js";

// Instructions
export {
	createAccount,
	createAccountWithSeed,
	deriveSeededAddress,
	generateMintSeed,
	initializeMint,
	mintTo,
	setAuthority,
	deriveAssociatedTokenAddress,
	createAssociatedTokenAccount,
	disableSelling,
	type AuthorityType,
	type CreateAccountParams,
	type CreateAccountWithSeedParams,
	type InitializeMintParams,
	type MintToParams,
	type SetAuthorityParams,
	type CreateAssociatedTokenAccountParams,
	type DisableSellingParams,
} from "./solana/instructions.js";

// Transactions
export {
	createUnsignedTransaction,
	serializeTransaction,
	encodeTransactionBase64,
	type UnsignedTransaction,
} from "./solana/transaction.js";
export {
	composeTokenCreation,
	composeRevokeAuthorities,
	composeDisableSelling,
	toRawAmount,
	estimateFee,
	type ComposeOptions,
	type TokenCreationParams,
	type TokenCreation,
	type RevokeAuthoritiesParams,
	type ComposeDisableSellingParams,
} from "./solana/compose.js";

// Security and deep links
export {
	validateTransaction,
	createSecurityPolicy,
	BASE_ALLOWED_PROGRAMS,
	type SecurityPolicy,
	type SecurityReason,
	type ValidationResult,
} from "./solana/security.js";
export {
	encodeDeepLink,
	buildDeepLink,
	parseDeepLink,
	type DeepLinkResult,
	type DeepLinkRejectReason,
	type DeepLinkOptions,
	type ParsedDeepLink,
} from "./solana/deepLink.js";

// Confirmation and retry
export {
	pollConfirmation,
	startConfirmation,
	type ConfirmationStatus,
	type ConfirmationDetail,
	type ConfirmationResult,
	type ConfirmationOptions,
	type ConfirmationTask,
} from "./solana/confirm.js";
export {
	withRetry,
	backoffDelay,
	sleep,
	isTransientRpcError,
	type RetryPolicy,
	type RetryOptions,
} from "./solana/retry.js";

// Mint reads
export {
	fetchMintInfo,
	explorerLinks,
	toWholeTokens,
	type MintInfo,
	type ExplorerName,
} from "./solana/mintInfo.js";

// Rate limiting
export {
	RateLimiter,
	type RateLimitRule,
	type RateLimitWindow,
	type RateLimitDecision,
	type RateLimiterOptions,
} from "./rateLimit.js";

// Client
export * from "./solana/client/index.js";
