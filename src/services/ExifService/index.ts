export * from "./ExifService";
export { ExifServiceExifTool } from "./ExifServiceExifTool";
