/**
 * Resolver Chain
 *
 * Runs the resolution strategies in order:
 *
 * 1. Literal bypass (`!model`, `!provider:model`) - returns immediately
 * 2. Profile prefix (`profile:alias`) - a profile alias returns immediately
 * 3. Substring matcher over the scoped provider table (exact hits flagged)
 * 4. Ranker picks one winner
 * 5. Chained follow of the winner's target
 *
 * Anything that matches nothing is passed through unresolved.
 */

import { ok, type Result } from "neverthrow";
import type { CircularAliasError } from "../types/errors.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import {
  findMatches,
  followAliasChain,
  rankMatches,
  resolutionScope,
  resolveLiteral,
  resolveProfile,
  unresolvedResult,
  withContextUpdates,
  type ResolutionContext,
  type ResolutionResult,
} from "./resolvers.js";

export interface ResolverChainOptions {
  /** Maximum aliases followed per resolution. Default: 8 */
  maxChainLength?: number;
}

export interface ResolverChain {
  resolve: (context: ResolutionContext) => Result<ResolutionResult, CircularAliasError>;
}

export const createResolverChain = (options: ResolverChainOptions = {}): ResolverChain => {
  const maxChainLength = options.maxChainLength ?? DEFAULT_CONFIG.maxAliasChainLength;

  const resolveScoped = (
    context: ResolutionContext
  ): Result<ResolutionResult, CircularAliasError> => {
    const { scope, model } = resolutionScope(context);
    const scoped = withContextUpdates(context, { model, provider: scope });
    const { table } = scoped;

    // Unscoped input can only happen without a default provider; every
    // provider is a candidate and declaration order breaks ties.
    const providers = scoped.provider !== undefined ? [scoped.provider] : table.providers;
    const ranked = rankMatches(findMatches(table, providers, scoped.model), table.providers);

    const winner = ranked[0];
    if (!winner) {
      return ok(unresolvedResult(scoped.model, scoped.provider));
    }

    return followAliasChain(table, winner, maxChainLength).map(
      ({ provider, model: resolvedModel, path }): ResolutionResult =>
        Object.freeze({
          resolvedModel,
          provider,
          wasResolved: true,
          resolutionPath: path,
          matches: ranked,
        })
    );
  };

  const resolve = (
    context: ResolutionContext
  ): Result<ResolutionResult, CircularAliasError> => {
    const literal = resolveLiteral(context);
    if (literal) return ok(literal);

    const profiled = resolveProfile(context);
    if (profiled?.result) return ok(profiled.result);

    return resolveScoped(
      profiled ? withContextUpdates(context, { model: profiled.model }) : context
    ).map((result) =>
      profiled ? Object.freeze({ ...result, profile: profiled.profile }) : result
    );
  };

  return { resolve };
};
