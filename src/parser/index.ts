export { parseXmlDocument } from "./xml.js";
