import { describe, expect, it } from 'vitest';

import { loadStyleConfiguration } from '../testing/fixtures';
import { PdfRenderError } from '../utils/errors';
import { isRecord } from '../utils/json';
import { PdfStyleEngine, validateStyleConfiguration } from './style-engine';

function section(config: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = config[key];
  if (!isRecord(value)) throw new Error(`fixture has no '${key}' section`);
  return value;
}

describe('validateStyleConfiguration', () => {
  it('accepts the shipped styles', () => {
    expect(() => validateStyleConfiguration(loadStyleConfiguration())).not.toThrow();
  });

  it('requires an object', () => {
    expect(() => validateStyleConfiguration('styles')).toThrow('Style configuration must be a JSON object');
  });

  it('names a missing section', () => {
    const config = loadStyleConfiguration();
    delete config.paragraph_styles;
    expect(() => validateStyleConfiguration(config)).toThrow(
      "Style configuration missing 'paragraph_styles' dictionary in styles.json",
    );
  });

  it('names a single missing paragraph style', () => {
    const config = loadStyleConfiguration();
    delete section(config, 'paragraph_styles').NameStyle;
    expect(() => validateStyleConfiguration(config)).toThrow(
      'Style configuration missing required paragraph styles: NameStyle',
    );
  });

  it('lists every missing paragraph style', () => {
    const config = loadStyleConfiguration();
    const styles = section(config, 'paragraph_styles');
    delete styles.DateStyle;
    delete styles.BodyStyle;
    expect(() => validateStyleConfiguration(config)).toThrow(
      'Style configuration missing required paragraph styles: BodyStyle, DateStyle',
    );
  });

  it('requires every margin and spacing value to be numeric', () => {
    const noMargin = loadStyleConfiguration();
    delete section(noMargin, 'margins').left;
    expect(() => validateStyleConfiguration(noMargin)).toThrow("Style configuration missing 'margins.left' in styles.json");

    const badSpacing = loadStyleConfiguration();
    section(badSpacing, 'spacing').item_bottom = 'wide';
    expect(() => validateStyleConfiguration(badSpacing)).toThrow(
      "Style configuration value 'spacing.item_bottom' must be a number in styles.json",
    );
  });

  it('requires a usable social link colour', () => {
    const noLinks = loadStyleConfiguration();
    noLinks.links = {};
    expect(() => validateStyleConfiguration(noLinks)).toThrow(
      "Style configuration missing 'links.social_link_color' in styles.json",
    );

    const badColor = loadStyleConfiguration();
    badColor.links = { social_link_color: 'not-a-color' };
    expect(() => validateStyleConfiguration(badColor)).toThrow(
      "Style configuration has invalid 'links.social_link_color': not-a-color",
    );
  });

  it('accepts any CSS colour name', () => {
    const config = loadStyleConfiguration();
    config.links = { social_link_color: 'steelblue' };
    section(section(config, 'paragraph_styles'), 'BodyStyle').text_color = 'darkslategray';
    expect(() => validateStyleConfiguration(config)).not.toThrow();
    expect(new PdfStyleEngine(config).buildStylesheet().get('BodyStyle')).toMatchObject({ textColor: '#2f4f4f' });
  });

  it('checks the paragraph style fields up front', () => {
    const badColor = loadStyleConfiguration();
    section(section(badColor, 'paragraph_styles'), 'DateStyle').text_color = 'not-a-color';
    expect(() => validateStyleConfiguration(badColor)).toThrow('Invalid paragraph style color: not-a-color');

    const badSize = loadStyleConfiguration();
    section(section(badSize, 'paragraph_styles'), 'NameStyle').font_size = 'big';
    expect(() => new PdfStyleEngine(badSize)).toThrow("Paragraph style 'NameStyle' field 'font_size' must be a number");
  });

  it('raises PdfRenderError', () => {
    expect(() => validateStyleConfiguration({})).toThrow(PdfRenderError);
  });
});

describe('PdfStyleEngine', () => {
  const engine = new PdfStyleEngine(loadStyleConfiguration());

  it('exposes margins, spacing and link colour', () => {
    expect(engine.margins()).toEqual({ top: 19, bottom: 19, left: 19, right: 19 });
    expect(engine.margin('top')).toBe(19);
    expect(engine.spacing('minimal_bottom')).toBe(0.1);
    expect(engine.spacing('section_bottom')).toBe(2);
    expect(engine.socialLinkColor()).toBe('blue');
  });

  it('builds the configured paragraph styles', () => {
    const styles = engine.buildStylesheet();
    expect(styles.get('NameStyle')).toMatchObject({
      parent: 'Heading1',
      fontName: 'Helvetica-Bold',
      fontSize: 24,
      alignment: 'center',
      spaceAfter: 6,
    });
    expect(styles.get('ContactStyle')).toMatchObject({
      parent: 'BodyStyle',
      fontSize: 11,
      leftIndent: 0,
      alignment: 'center',
      spaceAfter: 2,
    });
    expect(styles.get('SectionTitleStyle')).toMatchObject({ textColor: '#888888', keepWithNext: true });
  });

  it('validates on construction', () => {
    expect(() => new PdfStyleEngine({ paragraph_styles: {} })).toThrow(PdfRenderError);
  });
});
