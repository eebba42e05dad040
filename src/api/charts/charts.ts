import { Request } from 'express';
import { renderPieSvg } from '../../utils/report/chart';
import { ViewRegistry } from '../../utils/views/registry';
import { buildChartData, ChartData, CHARTS_VIEW, ChartsView } from '../../views/charts';

/**
 * The open charts view's data, or freshly built data when it is closed
 */
function currentChartData(views: ViewRegistry): ChartData {
  const view = views.get(CHARTS_VIEW);
  return view instanceof ChartsView ? view.data : buildChartData();
}

export function getCharts(_request: Request, views: ViewRegistry): ChartData {
  return currentChartData(views);
}

/**
 * The all-time category share as an SVG document
 */
export function getShareSvg(_request: Request, views: ViewRegistry): string {
  return renderPieSvg(currentChartData(views).share, 'Category share (all time)');
}
