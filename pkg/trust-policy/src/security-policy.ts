import type { ChainValidator } from "./chain-validator";
import { type Evaluation, evaluateServerTrust } from "./evaluate";
import { NodeChainValidator } from "./node-chain-validator";
import { PinnedSet } from "./pinned-set";
import { PinningMode } from "./pinning-mode";
import type { ServerTrust } from "./server-trust";

let defaultPolicy: SecurityPolicy | undefined;
let defaultPins: readonly Uint8Array[] = [];

/**
 * Server trust evaluation policy.
 *
 * @remarks
 * This type is immutable and may be shared by any number of concurrent evaluations.
 * To change a setting, derive a new policy with one of the `with*` methods.
 */
export class SecurityPolicy {
  /**
   * Access the shared default policy.
   * It does not pin, does not allow invalid certificates, and validates domain names.
   */
  public static getDefault(): SecurityPolicy {
    defaultPolicy ??= SecurityPolicy.create();
    return defaultPolicy;
  }

  /**
   * Create a policy.
   *
   * @throws ConfigurationError
   * Thrown if a pinned certificate is malformed, or if the pinning mode requires pins but there are none.
   */
  public static create({
    pinningMode = PinningMode.Default,
    pinnedCertificates = [],
    allowInvalidCertificates = false,
    validatesDomainName = true,
    validator = NodeChainValidator.getDefault(),
  }: SecurityPolicy.Options = {}): SecurityPolicy {
    return new SecurityPolicy(PinnedSet.build(pinningMode, pinnedCertificates),
      allowInvalidCertificates, validatesDomainName, validator);
  }

  /**
   * Create a policy with a pinning mode.
   * @param pinnedCertificates - DER certificates to pin.
   * If omitted, certificates registered with {@link SecurityPolicy.setDefaultPinnedCertificates} are pinned.
   *
   * @throws ConfigurationError
   * Thrown if a pinned certificate is malformed, or if the pinning mode requires pins but there are none.
   */
  public static withPinningMode(
      pinningMode: PinningMode,
      pinnedCertificates: Iterable<Uint8Array> = defaultPins,
  ): SecurityPolicy {
    return SecurityPolicy.create({ pinningMode, pinnedCertificates });
  }

  /**
   * Register the pinned certificates used by {@link SecurityPolicy.withPinningMode} when none
   * are specified, typically the result of {@link certificatesInBundle}.
   * Policies created earlier are unaffected.
   */
  public static setDefaultPinnedCertificates(pins: Iterable<Uint8Array>): void {
    defaultPins = Array.from(pins, (der) => Uint8Array.from(der));
  }

  private constructor(
      private readonly pinned: PinnedSet,
      public readonly allowInvalidCertificates: boolean,
      public readonly validatesDomainName: boolean,
      public readonly validator: ChainValidator,
  ) {}

  public get pinningMode(): PinningMode { return this.pinned.mode; }

  /** Pinned certificates in DER encoding, deduplicated. Each call returns fresh copies. */
  public get pinnedCertificates(): Uint8Array[] {
    return this.pinned.certificates.map((cert) => Uint8Array.from(cert.der));
  }

  /**
   * Derive a policy with different pinned certificates.
   *
   * @throws ConfigurationError
   * Thrown if a pinned certificate is malformed, or if the pinning mode requires pins but there are none.
   */
  public withPinnedCertificates(pins: Iterable<Uint8Array>): SecurityPolicy {
    return new SecurityPolicy(PinnedSet.build(this.pinningMode, pins),
      this.allowInvalidCertificates, this.validatesDomainName, this.validator);
  }

  /**
   * Derive a policy that tolerates, or stops tolerating, chains that fail validation.
   *
   * @remarks
   * With pinning mode `none`, allowing invalid certificates accepts any server.
   * This is intended for development only.
   */
  public withAllowInvalidCertificates(allowInvalidCertificates: boolean): SecurityPolicy {
    return new SecurityPolicy(this.pinned,
      allowInvalidCertificates, this.validatesDomainName, this.validator);
  }

  /** Derive a policy that enables or disables hostname validation. */
  public withValidatesDomainName(validatesDomainName: boolean): SecurityPolicy {
    return new SecurityPolicy(this.pinned,
      this.allowInvalidCertificates, validatesDomainName, this.validator);
  }

  /** Derive a policy that uses another chain validator. */
  public withValidator(validator: ChainValidator): SecurityPolicy {
    return new SecurityPolicy(this.pinned,
      this.allowInvalidCertificates, this.validatesDomainName, validator);
  }

  /**
   * Determine whether a server should be trusted.
   * @param trust - Chain presented by the server.
   * @param hostname - Intended hostname. If omitted, hostname is not validated.
   * @param now - Validation time.
   */
  public evaluateServerTrust(trust: ServerTrust, hostname?: string, now?: number): boolean {
    return this.explain(trust, hostname, now).accepted;
  }

  /**
   * Determine whether a server should be trusted, with an explanation.
   * The decision is identical to {@link SecurityPolicy.evaluateServerTrust}.
   */
  public explain(trust: ServerTrust, hostname?: string, now?: number): Evaluation {
    const { pinned, allowInvalidCertificates, validatesDomainName, validator } = this;
    return evaluateServerTrust({ pinned, allowInvalidCertificates, validatesDomainName, validator },
      trust, hostname, now);
  }
}

export namespace SecurityPolicy {
  /** {@link SecurityPolicy.create} options. */
  export interface Options {
    /**
     * Pinning mode.
     * @defaultValue `"none"`
     */
    pinningMode?: PinningMode;

    /**
     * DER certificates to pin.
     * @defaultValue `[]`
     */
    pinnedCertificates?: Iterable<Uint8Array>;

    /**
     * Whether a chain that fails validation may still be accepted.
     * Pinning, if enabled, is enforced regardless.
     * @defaultValue false
     */
    allowInvalidCertificates?: boolean;

    /**
     * Whether the leaf certificate must match the hostname, when a hostname is given.
     * @defaultValue true
     */
    validatesDomainName?: boolean;

    /**
     * Chain validator.
     * @defaultValue `NodeChainValidator.getDefault()`
     */
    validator?: ChainValidator;
  }
}
