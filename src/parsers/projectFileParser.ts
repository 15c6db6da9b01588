import { logger } from '../core/logger';
import { IXmlFileReader, XmlElement, XmlFileReader, attributeValue, childElements, elementText } from '../system/xmlFileReader';

/**
 * A `<Compile Include="...">` item of an MSBuild project file
 */
export interface CompileItem {
    include: string;
    /** `<AutoGen>True</AutoGen>` is set on the item */
    autoGenerated: boolean;
}

const log = logger('ProjectFileParser');

export class ProjectFileParser {

    constructor(private readonly xmlFileReader: IXmlFileReader = new XmlFileReader()) { }

    async parseCompileItems(projectPath: string): Promise<CompileItem[]> {
        try {
            const document = await this.xmlFileReader.load(projectPath);
            const items = getCompileItems(document);

            log.debug(`Found ${items.length} compile items in ${projectPath}`);
            return items;
        } catch (error) {
            log.error(`Error parsing project file ${projectPath}:`, error);
            throw error;
        }
    }
}

/**
 * Compile items under `/Project/ItemGroup/Compile`, in document order
 */
export function getCompileItems(document: XmlElement): CompileItem[] {
    const items: CompileItem[] = [];

    for (const project of childElements(document, 'Project')) {
        for (const itemGroup of childElements(project, 'ItemGroup')) {
            for (const compile of childElements(itemGroup, 'Compile')) {
                const include = attributeValue(compile, 'Include');
                if (include === undefined) {
                    continue;
                }

                items.push({
                    include,
                    autoGenerated: isAutoGenerated(compile)
                });
            }
        }
    }

    return items;
}

function isAutoGenerated(compile: XmlElement): boolean {
    return childElements(compile, 'AutoGen').some(autoGen =>
        elementText(autoGen)?.trim().toLowerCase() === 'true'
    );
}
