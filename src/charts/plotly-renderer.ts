import type { AxisValue, ChartGuide, ChartKind, ChartSeries, ChartSpec, ChartTheme } from './chart-types.js'

/**
 * Subset of the Plotly figure schema the report emits. The browser loads
 * Plotly itself; this module only produces the JSON it is fed.
 */
export interface PlotlyTrace {
  type: 'scatter' | 'bar'
  name: string
  x: AxisValue[]
  y: number[]
  mode?: 'lines' | 'lines+markers'
  stackgroup?: string
  opacity?: number
  line?: { color?: string }
  marker?: { color?: string | string[]; size?: number }
}

export interface PlotlyShape {
  type: 'line'
  xref: 'paper'
  x0: 0
  x1: 1
  yref: 'y'
  y0: number
  y1: number
  line: { color?: string; dash?: 'dash' }
}

export interface PlotlyAnnotation {
  xref: 'paper'
  x: 1
  xanchor: 'right'
  yref: 'y'
  y: number
  yanchor: 'top'
  text: string
  showarrow: false
}

export interface PlotlyLayout {
  barmode?: 'stack'
  paper_bgcolor: string
  plot_bgcolor: string
  font: { color: string }
  xaxis: { type: 'category'; gridcolor: string }
  yaxis: {
    ticksuffix: string
    showticksuffix: 'all'
    gridcolor: string
    range?: [number, number]
  }
  shapes: PlotlyShape[]
  annotations: PlotlyAnnotation[]
}

export interface PlotlyFigure {
  data: PlotlyTrace[]
  layout: PlotlyLayout
}

export const THEME_COLORS: Record<ChartTheme, { background: string; font: string; grid: string }> = {
  dark: { background: '#111111', font: '#f2f5fa', grid: '#283442' },
  light: { background: '#ffffff', font: '#2a3f5f', grid: '#e5ecf6' },
}

const markerOf = (series: ChartSeries): PlotlyTrace['marker'] => {
  if (series.pointColors) return { color: series.pointColors, size: 7 }
  if (series.color) return { color: series.color }
  return undefined
}

const lineTrace = (series: ChartSeries): PlotlyTrace => ({
  type: 'scatter',
  name: series.name,
  x: series.x,
  y: series.y,
  mode: series.markers ? 'lines+markers' : 'lines',
  opacity: series.opacity,
  line: { color: series.lineColor ?? series.color },
  marker: markerOf(series),
})

const areaTrace = (series: ChartSeries): PlotlyTrace => ({
  type: 'scatter',
  name: series.name,
  x: series.x,
  y: series.y,
  mode: 'lines',
  stackgroup: 'one',
  opacity: series.opacity,
  line: series.color ? { color: series.color } : undefined,
})

const barTrace = (series: ChartSeries): PlotlyTrace => ({
  type: 'bar',
  name: series.name,
  x: series.x,
  y: series.y,
  opacity: series.opacity,
  marker: markerOf(series),
})

/**
 * One trace renderer per chart kind.
 */
export const TRACE_RENDERERS: Record<ChartKind, (series: ChartSeries) => PlotlyTrace> = {
  line: lineTrace,
  area: areaTrace,
  bar: barTrace,
}

const guideShape = (guide: ChartGuide): PlotlyShape => ({
  type: 'line',
  xref: 'paper',
  x0: 0,
  x1: 1,
  yref: 'y',
  y0: guide.y,
  y1: guide.y,
  line: { color: guide.color, dash: guide.dashed ? 'dash' : undefined },
})

const guideAnnotation = (guide: ChartGuide & { label: string }): PlotlyAnnotation => ({
  xref: 'paper',
  x: 1,
  xanchor: 'right',
  yref: 'y',
  y: guide.y,
  yanchor: 'top',
  text: guide.label,
  showarrow: false,
})

const hasLabel = (guide: ChartGuide): guide is ChartGuide & { label: string } =>
  guide.label !== undefined

/**
 * Converts a chart spec into a Plotly figure.
 */
export const renderPlotlyFigure = (spec: ChartSpec, theme: ChartTheme): PlotlyFigure => {
  const colors = THEME_COLORS[theme]
  const renderTrace = TRACE_RENDERERS[spec.kind]

  return {
    data: spec.series.map(renderTrace),
    layout: {
      barmode: spec.kind === 'bar' ? 'stack' : undefined,
      paper_bgcolor: colors.background,
      plot_bgcolor: colors.background,
      font: { color: colors.font },
      xaxis: { type: 'category', gridcolor: colors.grid },
      yaxis: {
        ticksuffix: spec.yAxis.suffix,
        showticksuffix: 'all',
        gridcolor: colors.grid,
        range: spec.yAxis.range,
      },
      shapes: spec.guides.map(guideShape),
      annotations: spec.guides.filter(hasLabel).map(guideAnnotation),
    },
  }
}
