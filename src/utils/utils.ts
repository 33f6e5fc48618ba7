// example: 1234567 => "1,234,567 bytes"
export function formatByteCount(n: number): string {
  return `${n.toLocaleString("en-US")} bytes`;
}

// example: 41.6666 => "41.67%"
export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}
