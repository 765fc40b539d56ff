import { ConfigError } from '../errors/index.js';
import type { ColorOptions, FontOptions, StyleOptions } from '../types/index.js';
import { getLogger, type LoggingService } from '../services/LoggingService.js';
import { Color, ColorTable } from '../resources/Color.js';
import { Font, FontTable } from '../resources/Font.js';
import { Style, StyleSheet } from '../resources/Style.js';

export interface DocumentTemplateOptions {
  defaultLanguage?: number;          // \deflang
  asianDefaultLanguage?: number;     // \adeflang
  paragraphStyle?: string;           // Default paragraph style id
  footnoteStyle?: string;            // Default footnote style id
  logger?: LoggingService;
}

/**
 * Fonts, colors and styles shared by the documents built from it.
 *
 * Populate it, then hand it to documents: the first document freezes it,
 * after which every registration throws.
 */
export class DocumentTemplate {
  readonly fonts: FontTable;
  readonly colors: ColorTable;
  readonly styles: StyleSheet;
  readonly defaultLanguage: number;
  readonly asianDefaultLanguage: number;
  private paragraphStyleId: string;
  private footnoteStyleId: string;

  constructor(options: DocumentTemplateOptions = {}) {
    const logger = options.logger ?? getLogger();
    this.fonts = new FontTable(logger);
    this.colors = new ColorTable(logger);
    this.styles = new StyleSheet(logger);
    this.defaultLanguage = options.defaultLanguage ?? 1033;
    this.asianDefaultLanguage = options.asianDefaultLanguage ?? 1033;
    this.paragraphStyleId = options.paragraphStyle ?? 's0';
    this.footnoteStyleId = options.footnoteStyle ?? 's0';
  }

  registerFont(options: FontOptions): Font {
    return this.fonts.register(new Font(options));
  }

  registerColor(options: ColorOptions): Color {
    return this.colors.register(new Color(options));
  }

  registerStyle(options: StyleOptions): Style {
    return this.styles.register(new Style(options));
  }

  setDefaultStyles(paragraphStyle: string, footnoteStyle: string): void {
    if (this.isFrozen) {
      throw new ConfigError('Cannot change default styles: the template is frozen');
    }
    this.paragraphStyleId = paragraphStyle;
    this.footnoteStyleId = footnoteStyle;
  }

  get defaultParagraphStyle(): Style {
    return this.requireStyle(this.paragraphStyleId);
  }

  get defaultFootnoteStyle(): Style {
    return this.requireStyle(this.footnoteStyleId);
  }

  /**
   * @throws ConfigError if no style has this id
   */
  requireStyle(id: string): Style {
    const style = this.styles.get(id);
    if (!style) {
      throw new ConfigError(`Style "${id}" is not registered`, { id }, [
        `Registered styles: ${this.styles.ids().join(', ') || '(none)'}`,
      ]);
    }
    return style;
  }

  freeze(): void {
    // Fails early if the defaults point nowhere
    this.requireStyle(this.paragraphStyleId);
    this.requireStyle(this.footnoteStyleId);

    this.fonts.freeze();
    this.colors.freeze();
    this.styles.freeze();
  }

  get isFrozen(): boolean {
    return this.styles.isFrozen;
  }
}
