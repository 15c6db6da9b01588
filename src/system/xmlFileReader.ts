import * as fs from 'fs';
import { parseStringPromise } from 'xml2js';

/**
 * An element as produced by xml2js: attributes under `$`, text under `_`
 * and child elements as arrays keyed by tag name.
 */
export type XmlElement = Record<string, unknown>;

export interface IXmlFileReader {
    /** Loads an XML file and returns its document element's parent object */
    load(filePath: string): Promise<XmlElement>;
}

export class XmlFileReader implements IXmlFileReader {
    async load(filePath: string): Promise<XmlElement> {
        const content = await fs.promises.readFile(filePath, 'utf8');
        return parseXml(content);
    }
}

export async function parseXml(content: string): Promise<XmlElement> {
    const parsed: unknown = await parseStringPromise(content);
    return isXmlElement(parsed) ? parsed : {};
}

function isXmlElement(value: unknown): value is XmlElement {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Child elements with the given tag name. Text-only children become `{ _: text }`.
 */
export function childElements(element: XmlElement, name: string): XmlElement[] {
    const children = element[name];
    if (children === undefined) {
        return [];
    }

    const list: unknown[] = Array.isArray(children) ? children : [children];
    const result: XmlElement[] = [];

    for (const child of list) {
        if (typeof child === 'string') {
            result.push({ _: child });
        } else if (isXmlElement(child)) {
            result.push(child);
        }
    }

    return result;
}

export function attributeValue(element: XmlElement, name: string): string | undefined {
    const attributes = element.$;
    if (!isXmlElement(attributes)) {
        return undefined;
    }

    const value = attributes[name];
    return typeof value === 'string' ? value : undefined;
}

export function elementText(element: XmlElement): string | undefined {
    const text = element._;
    return typeof text === 'string' ? text : undefined;
}
