/**
 * Data-only chart descriptions. Builders in chart-specs.ts produce them from
 * report data; renderers turn them into a concrete plotting format.
 */

/**
 * - `line`: one line per series
 * - `area`: series stacked as filled areas
 * - `bar`: series stacked as bars
 */
export type ChartKind = 'line' | 'area' | 'bar'

export type AxisValue = string | number

export interface ChartSeries {
  name: string
  x: AxisValue[]
  y: number[]
  color?: string
  /** Per-point marker colors; overrides `color` for markers only */
  pointColors?: string[]
  /** Line color when markers are colored per point */
  lineColor?: string
  opacity?: number
  /** Draw a marker at every point */
  markers?: boolean
}

/** Horizontal reference line */
export interface ChartGuide {
  y: number
  color?: string
  dashed?: boolean
  label?: string
}

export interface ChartSpec {
  kind: ChartKind
  series: ChartSeries[]
  guides: ChartGuide[]
  yAxis: {
    /** Appended to every tick label, e.g. "€" or "%" */
    suffix: string
    range?: [number, number]
  }
}

export interface NamedChart {
  name: string
  spec: ChartSpec
}

export type ChartTheme = 'dark' | 'light'
