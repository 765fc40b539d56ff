import type { LoggingService } from '../services/LoggingService.js';
import { DocumentTemplate } from './DocumentTemplate.js';

/**
 * A ready-made template: serif and sans fonts, a biblical-language font,
 * three accent colors, and body, heading and footnote styles for
 * left-to-right and right-to-left text.
 */
export function createDefaultTemplate(logger?: LoggingService): DocumentTemplate {
  const template = new DocumentTemplate({
    defaultLanguage: 1027,
    asianDefaultLanguage: 1037,
    paragraphStyle: 's0',
    footnoteStyle: 's23',
    logger,
  });

  template.registerFont({ id: 'f0', name: 'Times New Roman' });
  template.registerFont({ id: 'f1', name: 'Linux Libertine' });
  template.registerFont({ id: 'f2', name: 'SBL BibLit' });
  template.registerFont({ id: 'f3', name: 'Linux Biolinum', family: 'swiss' });

  template.registerColor({ id: '1', red: 128, green: 128, blue: 128 }); // grey
  template.registerColor({ id: '2', red: 128, green: 64, blue: 0 });    // orange
  template.registerColor({ id: '3', red: 255, green: 255, blue: 255 }); // white

  template.registerStyle({ id: 's0', name: 'Default' });
  template.registerStyle({
    id: 's21', name: 'Body Text', basedOn: 's0',
    font: 'f1', fontSize: 24, language: 1024,
  });
  template.registerStyle({
    id: 's22', name: 'Body Text RTL', basedOn: 's21',
    font: 'f2', fontSize: 24, alignment: 'justify', direction: 'rtl', language: 1037,
  });
  template.registerStyle({
    id: 's23', name: 'Footnote', basedOn: 's21',
    font: 'f1', fontSize: 18, leftIndent: 227, firstLineIndent: -227,
  });
  template.registerStyle({
    id: 's24', name: 'Footnote RTL', basedOn: 's23',
    font: 'f2', fontSize: 22, language: 1037,
  });
  template.registerStyle({
    id: 's25', name: 'Heading', basedOn: 's21',
    alignment: 'center', keepWithNext: true, bold: true,
    font: 'f1', fontSize: 28, spaceBefore: 1132, spaceAfter: 566, language: 1609,
  });
  template.registerStyle({
    id: 's26', name: 'Footnote Body', basedOn: 's23',
    font: 'f1', fontSize: 20, leftIndent: 227, firstLineIndent: -227, language: 1027,
  });
  template.registerStyle({
    id: 's27', name: 'Body Text Greek', basedOn: 's21',
    font: 'f1', fontSize: 24, lineSpacing: 276, hyphenation: true, language: 1609,
  });
  template.registerStyle({
    id: 's28', name: 'Hidden Heading', basedOn: 's0',
    alignment: 'left', keepWithNext: true, font: 'f1', fontSize: 4, color: '3', language: 1609,
  });
  template.registerStyle({
    id: 's29', name: 'Footnote Italian', basedOn: 's23',
    font: 'f1', fontSize: 20, leftIndent: 227, firstLineIndent: -227, hyphenation: true, language: 1040,
  });

  return template;
}
