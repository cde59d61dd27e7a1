import { TemplateStatusRenderer, serializeStatusData } from '../status-renderer';
import type { StatusPageData } from '../status-renderer';
import { buildTestConfig, createConfigService } from '../../../test/helpers/test-config';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

const TEMPLATE = [
  '<html><body><script>',
  'let mailServerData = {',
  '    sendingWorks: true,',
  '    lastUpdated: {',
  '        sending: 0,',
  '    },',
  '};',
  'render(mailServerData);',
  '</script></body></html>',
].join('\n');

function rendererFor(template: string): TemplateStatusRenderer {
  return new TemplateStatusRenderer(
    createConfigService(buildTestConfig({ status: { templatePath: 'status.html', template } })),
  );
}

const DATA: StatusPageData = {
  sendingWorks: false,
  receivingWorks: true,
  spamScore: 8.5,
  lastUpdated: { sending: 1704067200, receiving: 1704067200, spam: 1704060000 },
  spamTestUrl: 'https://spam-score.test/result',
};

describe('serializeStatusData', () => {
  it('should produce indented JSON', () => {
    expect(serializeStatusData(DATA)).toBe(JSON.stringify(DATA, null, 4));
  });

  it('should escape "<" so the data cannot close the script element', () => {
    const serialized = serializeStatusData({ ...DATA, spamTestUrl: 'https://x.test/</script><b>' });

    expect(serialized).toContain('"spamTestUrl": "https://x.test/\\u003c/script>\\u003cb>"');
  });
});

describe('TemplateStatusRenderer', () => {
  it('should replace the data block with current values', () => {
    const html = rendererFor(TEMPLATE).render(DATA);

    expect(html).toBe(
      [
        '<html><body><script>',
        `let mailServerData = ${JSON.stringify(DATA, null, 4)};`,
        'render(mailServerData);',
        '</script></body></html>',
      ].join('\n'),
    );
  });

  it('should render from the pristine template every time', () => {
    const renderer = rendererFor(TEMPLATE);

    renderer.render(DATA);
    const second = renderer.render({ ...DATA, spamScore: 3 });

    expect(second).toContain('"spamScore": 3,');
    expect(second).not.toContain('"spamScore": 8.5');
  });

  it('should not expand replacement patterns found in the data', () => {
    const html = rendererFor(TEMPLATE).render({ ...DATA, spamTestUrl: 'https://spam-score.test/?q=$&' });

    expect(html).toContain('"spamTestUrl": "https://spam-score.test/?q=$&"');
  });

  it('should serve a template without a data block unchanged', () => {
    const restoreLogger = silenceNestLogger();
    const template = '<html><body>static</body></html>';

    expect(rendererFor(template).render(DATA)).toBe(template);
    restoreLogger();
  });
});
