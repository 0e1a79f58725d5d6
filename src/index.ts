/**
 * @since 1.0.0
 */

/**
 * @since 1.0.0
 */
export * as KeyStatistics from "cache-statistics/KeyStatistics"

/**
 * @since 1.0.0
 */
export * as Statistics from "cache-statistics/Statistics"

/**
 * @since 1.0.0
 */
export * as StatisticsMutator from "cache-statistics/StatisticsMutator"

/**
 * @since 1.0.0
 */
export * as UnmonitoredKeyError from "cache-statistics/UnmonitoredKeyError"
