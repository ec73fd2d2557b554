import { Certificate } from "@certpin/x509";

import type { ChainValidator, ServerTrust } from "..";

/**
 * Chain validator with a predetermined verdict.
 *
 * @remarks
 * Unless `chain` is specified, the reported chain is the parsed presented chain.
 */
export class FakeValidator implements ChainValidator {
  public readonly calls: Array<[trust: ServerTrust, opts: ChainValidator.Options]> = [];

  constructor(private readonly opts: FakeValidator.Options = {}) {}

  public validate(trust: ServerTrust, opts: ChainValidator.Options = {}): ChainValidator.Result {
    this.calls.push([trust, opts]);
    const { verdict = true, chain, error } = this.opts;
    if (error) {
      throw error;
    }
    return {
      systemVerdict: verdict,
      chain: chain ?? trust.chain.map((der) => Certificate.fromDer(der)),
      reason: verdict ? undefined : "fake rejection",
    };
  }
}

export namespace FakeValidator {
  export interface Options {
    verdict?: boolean;
    chain?: Certificate[];
    error?: Error;
  }
}
