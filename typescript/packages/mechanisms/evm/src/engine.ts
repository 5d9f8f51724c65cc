import {
  MonotonicClock,
  isAuthorizationError,
  systemClock,
  type Address,
  type ApprovalEvent,
  type AuthorizationCanceledEvent,
  type AuthorizationFailureEvent,
  type AuthorizationOperation,
  type AuthorizationStateStore,
  type AuthorizationUsedEvent,
  type Clock,
  type Hex,
  type LedgerPort,
  type Logger,
  type PermitNonceStore,
} from "@permitkit/core";
import { TransferAuthorizationManager } from "./authorization";
import { getConfigChainId, type EngineConfig } from "./config";
import type { AuthorizationContext } from "./context";
import { DomainSeparatorProvider, staticNetworkIdentity } from "./domain";
import { StructuredHashBuilder } from "./hash";
import { PermitManager } from "./permit";
import type {
  AccountResolver,
  CancelAuthorizationRequest,
  Eip712DomainDescription,
  NetworkIdentity,
  PermitRequest,
  ReceiveAuthorizationRequest,
  TransferAuthorizationRequest,
} from "./types";
import { SignatureVerifier, rawKeyAccountResolver } from "./verifier";

/**
 * Engine Hook Type Definitions
 */

export type ApprovalHook = (event: ApprovalEvent) => void | Promise<void>;
export type AuthorizationUsedHook = (event: AuthorizationUsedEvent) => void | Promise<void>;
export type AuthorizationCanceledHook = (event: AuthorizationCanceledEvent) => void | Promise<void>;
export type AuthorizationFailureHook = (event: AuthorizationFailureEvent) => void | Promise<void>;

/**
 * Configuration options for the authorization engine
 */
export interface AuthorizationEngineOptions {
  /**
   * EIP-712 domain name
   */
  name: string;

  /**
   * EIP-712 domain version
   */
  version: string;

  /**
   * Current chain id and deployment address, read on every digest
   */
  network: NetworkIdentity;

  /**
   * Ledger receiving approvals and transfers
   */
  ledger: LedgerPort;

  /**
   * Probe for programmable (ERC-1271) accounts
   *
   * @default every signer is a raw key
   */
  accounts?: AccountResolver;

  /**
   * Time source; always wrapped so readings never decrease
   *
   * @default the system clock
   */
  clock?: Clock;

  /**
   * Reject high-s ECDSA signatures
   *
   * @default true
   */
  enforceLowS?: boolean;

  /**
   * Permit counter store
   */
  permitNonces?: PermitNonceStore;

  /**
   * Authorization state store
   */
  authorizationStates?: AuthorizationStateStore;

  /**
   * @default console
   */
  logger?: Logger;
}

/**
 * Collaborators for {@link AuthorizationEngine.fromConfig}.
 */
export type AuthorizationEngineDependencies = Omit<
  AuthorizationEngineOptions,
  "name" | "version" | "network" | "enforceLowS"
>;

/**
 * Offline-authorization engine: EIP-2612 permits and EIP-3009 transfer,
 * receive and cancel authorizations over one domain, ledger and clock.
 *
 * Every mutation either commits fully (replay state, ledger effect, event) or
 * rejects with nothing changed.
 */
export class AuthorizationEngine {
  private readonly domainProvider: DomainSeparatorProvider;
  private readonly permits: PermitManager;
  private readonly authorizations: TransferAuthorizationManager;
  private readonly logger: Logger;

  private approvalHooks: ApprovalHook[] = [];
  private authorizationUsedHooks: AuthorizationUsedHook[] = [];
  private authorizationCanceledHooks: AuthorizationCanceledHook[] = [];
  private authorizationFailureHooks: AuthorizationFailureHook[] = [];

  /**
   * Creates a new AuthorizationEngine.
   *
   * @param options - Domain, ports and stores
   */
  constructor(options: AuthorizationEngineOptions) {
    this.domainProvider = new DomainSeparatorProvider(
      options.name,
      options.version,
      options.network,
    );
    this.logger = options.logger ?? console;

    const context: AuthorizationContext = {
      hasher: new StructuredHashBuilder(this.domainProvider),
      verifier: new SignatureVerifier(options.accounts ?? rawKeyAccountResolver, {
        enforceLowS: options.enforceLowS,
      }),
      ledger: options.ledger,
      clock: new MonotonicClock(options.clock ?? systemClock),
    };
    this.permits = new PermitManager(context, options.permitNonces);
    this.authorizations = new TransferAuthorizationManager(context, options.authorizationStates);
  }

  /**
   * Creates an engine from a validated configuration.
   *
   * @param config - The engine configuration
   * @param dependencies - Ledger and optional collaborators
   * @returns A configured AuthorizationEngine instance
   */
  static fromConfig(
    config: EngineConfig,
    dependencies: AuthorizationEngineDependencies,
  ): AuthorizationEngine {
    return new AuthorizationEngine({
      ...dependencies,
      name: config.name,
      version: config.version,
      network: staticNetworkIdentity(getConfigChainId(config), config.verifyingContract),
      enforceLowS: config.enforceLowS,
    });
  }

  /**
   * Current EIP-712 domain separator, recomputed on every call.
   *
   * @returns The 32-byte domain separator
   */
  domainSeparator(): Hex {
    return this.domainProvider.domainSeparator();
  }

  /**
   * EIP-5267 description of the current domain.
   *
   * @returns The domain fields
   */
  eip712Domain(): Eip712DomainDescription {
    return this.domainProvider.eip712Domain();
  }

  /**
   * Next permit nonce of an owner.
   *
   * @param owner - The permit owner
   * @returns The owner's counter
   */
  nonces(owner: Address): bigint {
    return this.permits.nonces(owner);
  }

  /**
   * Alias of {@link AuthorizationEngine.nonces}.
   *
   * @param owner - The permit owner
   * @returns The owner's counter
   */
  nextPermitNonce(owner: Address): bigint {
    return this.permits.nonces(owner);
  }

  /**
   * Whether an authorization nonce has been used or canceled.
   *
   * @param authorizer - The signer
   * @param nonce - The 32-byte nonce
   * @returns true once used
   */
  authorizationState(authorizer: Address, nonce: Hex): boolean {
    return this.authorizations.authorizationState(authorizer, nonce);
  }

  /**
   * Applies a signed EIP-2612 permit.
   *
   * @param request - The signed permit
   * @returns The applied approval
   */
  async permit(request: PermitRequest): Promise<ApprovalEvent> {
    const event = await this.run("permit", request.owner, () => this.permits.permit(request));
    this.logger.debug(`Permit applied: ${event.owner} -> ${event.spender} (${event.value})`);
    await this.notify(this.approvalHooks, event);
    return event;
  }

  /**
   * Executes a signed EIP-3009 transfer authorization.
   *
   * @param request - The signed authorization
   * @returns The consumed (authorizer, nonce)
   */
  async transferWithAuthorization(
    request: TransferAuthorizationRequest,
  ): Promise<AuthorizationUsedEvent> {
    const event = await this.run("transferWithAuthorization", request.from, () =>
      this.authorizations.transferWithAuthorization(request),
    );
    this.logger.debug(`Authorization used: ${event.authorizer} ${event.nonce}`);
    await this.notify(this.authorizationUsedHooks, event);
    return event;
  }

  /**
   * Executes a signed EIP-3009 receive authorization on behalf of its payee.
   *
   * @param caller - Identity submitting the authorization; must equal `to`
   * @param request - The signed authorization
   * @returns The consumed (authorizer, nonce)
   */
  async receiveWithAuthorization(
    caller: Address,
    request: ReceiveAuthorizationRequest,
  ): Promise<AuthorizationUsedEvent> {
    const event = await this.run("receiveWithAuthorization", request.from, () =>
      this.authorizations.receiveWithAuthorization(caller, request),
    );
    this.logger.debug(`Authorization used: ${event.authorizer} ${event.nonce}`);
    await this.notify(this.authorizationUsedHooks, event);
    return event;
  }

  /**
   * Retires an unused authorization nonce.
   *
   * @param request - The signed cancellation
   * @returns The canceled (authorizer, nonce)
   */
  async cancelAuthorization(
    request: CancelAuthorizationRequest,
  ): Promise<AuthorizationCanceledEvent> {
    const event = await this.run("cancelAuthorization", request.authorizer, () =>
      this.authorizations.cancelAuthorization(request),
    );
    this.logger.debug(`Authorization canceled: ${event.authorizer} ${event.nonce}`);
    await this.notify(this.authorizationCanceledHooks, event);
    return event;
  }

  /**
   * Register a hook to execute after a permit is applied.
   *
   * @param hook - The hook function to register
   * @returns The AuthorizationEngine instance for chaining
   */
  onApproval(hook: ApprovalHook): AuthorizationEngine {
    this.approvalHooks.push(hook);
    return this;
  }

  /**
   * Register a hook to execute after a transfer or receive authorization is used.
   *
   * @param hook - The hook function to register
   * @returns The AuthorizationEngine instance for chaining
   */
  onAuthorizationUsed(hook: AuthorizationUsedHook): AuthorizationEngine {
    this.authorizationUsedHooks.push(hook);
    return this;
  }

  /**
   * Register a hook to execute after an authorization is canceled.
   *
   * @param hook - The hook function to register
   * @returns The AuthorizationEngine instance for chaining
   */
  onAuthorizationCanceled(hook: AuthorizationCanceledHook): AuthorizationEngine {
    this.authorizationCanceledHooks.push(hook);
    return this;
  }

  /**
   * Register a hook to execute when an operation is rejected.
   *
   * @param hook - The hook function to register
   * @returns The AuthorizationEngine instance for chaining
   */
  onAuthorizationFailure(hook: AuthorizationFailureHook): AuthorizationEngine {
    this.authorizationFailureHooks.push(hook);
    return this;
  }

  /**
   * Runs one operation, reporting a rejection to the failure hooks before rethrowing it.
   *
   * @param operation - Operation name
   * @param signer - Signer named by the request
   * @param action - The operation
   * @returns The operation's result
   */
  private async run<T>(
    operation: AuthorizationOperation,
    signer: Address,
    action: () => Promise<T>,
  ): Promise<T> {
    try {
      return await action();
    } catch (thrown) {
      const error = thrown instanceof Error ? thrown : new Error(String(thrown));
      const code = isAuthorizationError(error) ? error.code : undefined;
      this.logger.warn(`${operation} rejected for ${signer}: ${code ?? error.message}`);
      await this.notify(this.authorizationFailureHooks, { operation, signer, code, error });
      throw error;
    }
  }

  /**
   * Runs hooks in registration order. The operation has already committed, so
   * a failing hook is logged and does not reach the caller.
   *
   * @param hooks - The hooks to run
   * @param event - The event passed to each hook
   */
  private async notify<E>(hooks: Array<(event: E) => void | Promise<void>>, event: E): Promise<void> {
    for (const hook of hooks) {
      try {
        await hook(event);
      } catch (error) {
        this.logger.error("Authorization hook failed:", error);
      }
    }
  }
}
