import log from "loglevel";

export const policyLogger = log.getLogger("certpin.policy");
export const validatorLogger = log.getLogger("certpin.validator");
export const bundleLogger = log.getLogger("certpin.bundle");
