export * from "./InventoryScanner";
export { InventoryScannerDefault } from "./InventoryScannerDefault";
