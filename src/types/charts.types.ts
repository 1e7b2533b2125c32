export type ChartType = 'pie' | 'bar'

export type CostSegmentLabel = 'COGS' | 'Shopify Fees' | 'Ad Spend' | 'Profit'

export type SegmentColor = 'blue' | 'orange' | 'red' | 'green'

export interface CostSegment {
  label: CostSegmentLabel
  value: number
  color: SegmentColor
  /** Percentage of the total of all segments */
  share: number
}

export interface ChartAxisLabels {
  x: string
  y: string
}

/**
 * Cost distribution chart for a single unit
 * Segment values are clamped to >= 0; only `bar` charts carry axis labels
 */
export interface CostDistributionChart {
  type: ChartType
  title: string
  segments: CostSegment[]
  total: number
  axisLabels?: ChartAxisLabels
}
