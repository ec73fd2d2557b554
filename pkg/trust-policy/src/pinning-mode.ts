const modes = ["none", "public-key", "certificate"] as const;

/**
 * How pinned certificates constrain server trust.
 * - `none`: no pinning; trust is decided by chain validation.
 * - `public-key`: some certificate in the server chain must carry a pinned SubjectPublicKeyInfo.
 * - `certificate`: some certificate in the server chain must be a pinned certificate;
 *   pinned certificates also act as trust anchors.
 */
export type PinningMode = typeof modes[number];

export namespace PinningMode {
  export const Default: PinningMode = "none";
  export const Choices: readonly PinningMode[] = modes;

  const aliases = new Map<string, PinningMode>([
    ["none", "none"],
    ["publickey", "public-key"],
    ["key", "public-key"],
    ["spki", "public-key"],
    ["certificate", "certificate"],
    ["cert", "certificate"],
  ]);

  /**
   * Parse pinning mode from text.
   * Case and `-`/`_` separators are ignored, so that "PublicKey" and "public_key" are accepted.
   *
   * @throws Error
   * Thrown if the text does not name a pinning mode.
   */
  export function parse(input: string): PinningMode {
    const mode = aliases.get(input.toLowerCase().replaceAll(/[_-]/g, ""));
    if (mode === undefined) {
      throw new Error(`unknown pinning mode ${input}, expecting one of ${Choices.join(" ")}`);
    }
    return mode;
  }
}
