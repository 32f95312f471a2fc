export type MetricType = 'ms' | 'c' | 'g';

export type MetricLine = {
  name: string;
  value: string;
  type: MetricType;
  tags: string[];
};

export type MetricsTransport = {
  send: (line: MetricLine) => void;
};

export const formatMetricLine = ({
  namespace = '',
  staticTags = [],
  line
}: {
  namespace?: string;
  staticTags?: string[];
  line: MetricLine;
}) => {
  const tags = [...staticTags, ...line.tags];
  const base = `${namespace}${line.name}:${line.value}|${line.type}`;
  return tags.length > 0 ? `${base}|#${tags.join(',')}` : base;
};
