import { directoryPage, testConfigService } from '../../../test/fakes';
import { FetchStatus } from '../../domain/enums/fetch-status.enum';
import { DiretorioBrasilDirectoryAdapter } from './diretorio-brasil-directory.adapter';

describe('DiretorioBrasilDirectoryAdapter', () => {
  const adapter = new DiretorioBrasilDirectoryAdapter(testConfigService());
  const pageUrl = 'https://directory.test/filiais/acme-sa-11222333000181.html';

  it('construye la URL semilla con slug y dígitos', () => {
    expect(adapter.buildSeedUrls('acme-sa', '11222333000181')).toEqual([pageUrl]);
  });

  it('extrae etiqueta y CNPJ de cada fila', () => {
    const html = `
      <div class="row-list"><h5 class="socio"> Matriz </h5><p class="det">CNPJ 11.222.333/0001-81 - Ativa</p></div>
      <div class="row-list"><h5 class="socio">Filial</h5><p class="det">11222333000262</p></div>
      <div class="row-list"><h5 class="socio">Sem dados</h5><p class="det">n/d</p></div>`;

    expect(adapter.parsePage(html, pageUrl).rows).toEqual([
      { label: 'Matriz', rawCnpj: '11.222.333/0001-81' },
      { label: 'Filial', rawCnpj: '11.222.333/0002-62' },
    ]);
  });

  it('ignora las filas sin etiqueta h5.socio', () => {
    const html = `
      <div class="row-list"><p class="det">CNPJ 11.222.333/0004-24</p></div>
      <div class="row-list"><h5 class="socio">Filial</h5><p class="det">CNPJ 11.222.333/0003-43</p></div>`;

    expect(adapter.parsePage(html, pageUrl).rows).toEqual([{ label: 'Filial', rawCnpj: '11.222.333/0003-43' }]);
  });

  it('toma solo los links de paginación activos, absolutos, únicos y ordenados', () => {
    const html = `
      <nav aria-label="Resultado da busca"><ul>
        <li class="disabled"><a href="?p=1">1</a></li>
        <li><a href="?p=3">3</a></li>
        <li><a href="?p=2">2</a></li>
        <li><a href="?p=2">2</a></li>
        <li><a href="/sobre">sobre</a></li>
      </ul></nav>
      <a href="?p=9">fuera del nav</a>`;

    expect(adapter.parsePage(html, pageUrl).pageLinks).toEqual([
      `${pageUrl}?p=2`,
      `${pageUrl}?p=3`,
    ]);
  });

  it('la política exige el marcado del listado', () => {
    const listing = directoryPage([['Filial', '11.222.333/0002-62']]);
    expect(adapter.retryPolicy.classify(200, listing).status).toBe(FetchStatus.OK);
    expect(adapter.retryPolicy.classify(200, 'x'.repeat(100))).toEqual({
      status: FetchStatus.TRANSIENT_ERROR,
      reason: 'contenido esperado ausente',
    });
  });
});
