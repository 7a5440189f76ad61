export { formatSummary, Metrics, type StatsSummary } from './metrics.ts'
