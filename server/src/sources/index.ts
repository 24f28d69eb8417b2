/**
 * Extraction strategies, in the order the chain tries them
 */

import { ResolverConfig } from '../config/index.js';
import { BoundedFetcher } from '../services/bounded-fetcher.js';
import { MirrorRaceCoordinator } from '../services/mirror-race.js';
import { SecurityValidator } from '../services/security-validator.js';
import { TimeoutSafeMatcher } from '../services/timeout-safe-matcher.js';
import { ExtractionStrategy } from './base-strategy.js';
import { EmbeddedScriptStrategy } from './embedded-script-strategy.js';
import { IframeDelegationStrategy } from './iframe-strategy.js';
import { NumberedMirrorStrategy } from './numbered-mirror-strategy.js';
import { StructuredTagStrategy } from './structured-tag-strategy.js';

export { BaseStrategy, uniqueByUrl } from './base-strategy.js';
export type { ExtractionStrategy, StrategyContext } from './base-strategy.js';
export { StructuredTagStrategy } from './structured-tag-strategy.js';
export { NumberedMirrorStrategy, buildMirrorProbes, mirrorPathType } from './numbered-mirror-strategy.js';
export { EmbeddedScriptStrategy } from './embedded-script-strategy.js';
export { IframeDelegationStrategy } from './iframe-strategy.js';

export interface StrategyDependencies {
    fetcher: BoundedFetcher;
    matcher: TimeoutSafeMatcher;
    validator: SecurityValidator;
    coordinator: MirrorRaceCoordinator;
}

export function createStrategies(deps: StrategyDependencies, config: ResolverConfig): ExtractionStrategy[] {
    const tags = new StructuredTagStrategy();
    const scripts = new EmbeddedScriptStrategy(deps.matcher, config.scriptMaxChars);

    return [
        tags,
        new NumberedMirrorStrategy(deps.fetcher, deps.matcher, deps.validator, deps.coordinator, {
            mirrorCount: config.mirrorCount,
            mirrorMaxBytes: config.mirrorMaxBytes,
            mirrorTimeoutMs: config.mirrorTimeoutMs,
            raceTimeoutMs: config.raceTimeoutMs
        }),
        scripts,
        new IframeDelegationStrategy(deps.fetcher, deps.validator, tags, scripts, {
            maxBytes: config.pageMaxBytes,
            timeoutMs: config.fetchTimeoutMs
        })
    ];
}
