import { FakeTransport, testConfigService, testScraperConfig } from '../../../../test/fakes';
import { DiscoveryLayer } from '../../../domain/enums/discovery-layer.enum';
import { SearchEngineDiscoveryAdapter } from './search-engine-discovery.adapter';

describe('SearchEngineDiscoveryAdapter', () => {
  const searchUrl = 'https://www.google.com/search?q=%22Acme%22%20CNPJ';
  const withKey = testConfigService({
    searchEngine: { ...testScraperConfig().searchEngine, apiKey: 'test-secret' },
  });

  it('sin API key la capa queda deshabilitada', () => {
    const adapter = new SearchEngineDiscoveryAdapter(testConfigService(), new FakeTransport());
    expect(adapter.isEnabled()).toBe(false);
  });

  it('consulta SerpAPI y lee el knowledge graph', async () => {
    const transport = new FakeTransport().on(
      'https://serp.test/search.json?engine=google&q=%22Acme%22+CNPJ&hl=pt-BR&gl=br&api_key=test-secret',
      {
        status: 200,
        body: JSON.stringify({
          knowledge_graph: { legal_identifier: '11.222.333/0001-81', website: 'https://acme.com.br' },
        }),
      },
    );
    const adapter = new SearchEngineDiscoveryAdapter(withKey, transport);

    expect(adapter.isEnabled()).toBe(true);
    await expect(adapter.attempt('Acme')).resolves.toEqual({
      layer: DiscoveryLayer.SEARCH_ENGINE,
      candidates: ['11.222.333/0001-81'],
      sourceUrl: 'https://acme.com.br',
      note: 'CNPJ encontrado en knowledge_graph',
    });
  });

  describe('extract', () => {
    const adapter = new SearchEngineDiscoveryAdapter(withKey, new FakeTransport());

    it('answer_box cuando el knowledge graph no tiene CNPJ', () => {
      const payload = {
        knowledge_graph: { title: 'Acme' },
        answer_box: { answer: 'CNPJ 07.689.002/0001-89', link: 'https://answers.test/acme' },
      };
      expect(adapter.extract(payload, searchUrl)).toEqual({
        cnpjs: ['07.689.002/0001-89'],
        sourceUrl: 'https://answers.test/acme',
        section: 'answer_box',
      });
    });

    it('solo los primeros resultados orgánicos', () => {
      const organic = [
        { title: 'Acme', snippet: 'nada aquí', link: 'https://r1.test' },
        { title: 'CNPJ da Acme', snippet: '11222333000181 e 11.222.333/0002-62', link: 'https://r2.test' },
        { title: 'r3', snippet: '', link: 'https://r3.test' },
        { title: 'r4', snippet: '', link: 'https://r4.test' },
        { title: 'r5', snippet: '11.222.333/0001-81', link: 'https://r5.test' },
        { title: 'r6', snippet: '33.300.012/0001-90', link: 'https://r6.test' },
      ];
      expect(adapter.extract({ organic_results: organic }, searchUrl)).toEqual({
        cnpjs: ['11.222.333/0002-62', '11.222.333/0001-81'],
        sourceUrl: 'https://r2.test',
        section: 'organic_results',
      });
    });

    it('sin CNPJs → null', () => {
      expect(adapter.extract({ organic_results: [{ title: 'x', snippet: 'y' }] }, searchUrl)).toBeNull();
    });
  });
});
