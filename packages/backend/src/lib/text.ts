/** "missing_delivery" -> "Missing Delivery" */
export function titleCase(label: string): string {
  return label
    .split("_")
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}
