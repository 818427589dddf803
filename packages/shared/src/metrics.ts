export type MetricLabels = Record<string, string | number | boolean>;

type MetricType = "counter" | "gauge";

type MetricEntry = {
  name: string;
  labels: MetricLabels;
  value: number;
  type: MetricType;
};

const normalizeLabels = (labels: MetricLabels) =>
  Object.entries(labels)
    .map(([key, value]) => [key, String(value)] as const)
    .sort((a, b) => a[0].localeCompare(b[0]));

const labelsKey = (labels: MetricLabels) => JSON.stringify(normalizeLabels(labels));

const formatLabels = (labels: MetricLabels) => {
  const entries = normalizeLabels(labels);
  if (!entries.length) return "";
  const formatted = entries.map(([key, value]) => `${key}="${value.replace(/"/g, '\\"')}"`);
  return `{${formatted.join(",")}}`;
};

export type MetricsRegistry = {
  incCounter: (name: string, labels?: MetricLabels, delta?: number) => void;
  setGauge: (name: string, labels: MetricLabels, value: number) => void;
  getValue: (name: string, labels?: MetricLabels) => number | undefined;
  render: () => string;
};

/** In-process Prometheus text registry; `baseLabels` are merged into every series. */
export const createMetricsRegistry = (baseLabels: MetricLabels = {}): MetricsRegistry => {
  const entries = new Map<string, MetricEntry>();

  const keyOf = (name: string, labels: MetricLabels) => {
    const merged = { ...baseLabels, ...labels };
    return { key: `${name}:${labelsKey(merged)}`, merged };
  };

  const incCounter = (name: string, labels: MetricLabels = {}, delta = 1) => {
    const { key, merged } = keyOf(name, labels);
    const existing = entries.get(key);
    if (existing) {
      existing.value += delta;
      return;
    }
    entries.set(key, { name, labels: merged, value: delta, type: "counter" });
  };

  const setGauge = (name: string, labels: MetricLabels, value: number) => {
    const { key, merged } = keyOf(name, labels);
    const existing = entries.get(key);
    if (existing) {
      existing.value = value;
      return;
    }
    entries.set(key, { name, labels: merged, value, type: "gauge" });
  };

  const getValue = (name: string, labels: MetricLabels = {}) =>
    entries.get(keyOf(name, labels).key)?.value;

  // Families in first-seen order; each family's samples stay contiguous.
  const render = () => {
    const families = new Map<string, MetricEntry[]>();
    for (const entry of entries.values()) {
      const family = families.get(entry.name);
      if (family) {
        family.push(entry);
      } else {
        families.set(entry.name, [entry]);
      }
    }
    const lines: string[] = [];
    for (const [name, family] of families) {
      lines.push(`# TYPE ${name} ${family[0].type}`);
      for (const entry of family) {
        lines.push(`${name}${formatLabels(entry.labels)} ${entry.value}`);
      }
    }
    return lines.join("\n") + "\n";
  };

  return { incCounter, setGauge, getValue, render };
};
