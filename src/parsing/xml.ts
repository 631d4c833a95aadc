import { XMLParser } from "fast-xml-parser";

/**
 * XML normalization:
 * - repeated tags -> arrays
 * - text nodes flattened
 * - attributes under @
 * - ignore namespaces (strip prefix)
 * - values are kept as strings (no number/boolean guessing)
 */
export function parseXmlToObject(xml: string): unknown {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@",
    textNodeName: "#text",
    removeNSPrefix: true,
    alwaysCreateTextNode: false,
    parseTagValue: false,
    parseAttributeValue: false,
  });

  return parser.parse(xml, true);
}
