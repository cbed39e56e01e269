/**
 * Generacion de `.docx` para informes ANCI.
 *
 * - Con plantilla: se sustituyen los marcadores `{{MARCADOR}}` conocidos y los
 *   desconocidos quedan tal cual en el documento (se reportan al llamador).
 * - Sin plantilla: se arma el documento desde el informe estructurado.
 */
import { promises as fs } from 'node:fs';
import path from 'node:path';
import {
  AlignmentType,
  Document,
  HeadingLevel,
  Packer,
  Paragraph,
  PatchType,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
  patchDetector,
  patchDocument,
  type IPatch
} from 'docx';
import type { CampoInforme, InformeEstructurado } from '../domain/informeEstructurado';
import { esMarcadorConocido, VALOR_VACIO, type ValoresMarcadores } from '../domain/marcadores';

export type ResultadoSustitucion = {
  contenido: Buffer;
  marcadoresEncontrados: string[];
  marcadoresDesconocidos: string[];
};

/** Lee la plantilla; `null` si no existe el archivo. */
export async function cargarPlantilla(directorio: string, archivo: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(path.join(directorio, archivo));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw error;
  }
}

export async function detectarMarcadores(plantilla: Buffer): Promise<string[]> {
  const encontrados = await patchDetector({ data: plantilla });
  return Array.from(new Set(encontrados.map((m) => m.trim())));
}

export async function sustituirMarcadores(plantilla: Buffer, valores: ValoresMarcadores): Promise<ResultadoSustitucion> {
  const marcadoresEncontrados = await detectarMarcadores(plantilla);
  const marcadoresDesconocidos = marcadoresEncontrados.filter((m) => !esMarcadorConocido(m));

  const patches: Record<string, IPatch> = {};
  for (const marcador of marcadoresEncontrados) {
    if (!esMarcadorConocido(marcador)) continue;
    patches[marcador] = { type: PatchType.PARAGRAPH, children: [new TextRun(valores[marcador])] };
  }

  const contenido = await patchDocument({
    outputType: 'nodebuffer',
    data: plantilla,
    patches,
    keepOriginalStyles: true
  });
  return { contenido, marcadoresEncontrados, marcadoresDesconocidos };
}

function celda(texto: string, negrita = false) {
  return new TableCell({
    children: [new Paragraph({ children: [new TextRun({ text: texto || VALOR_VACIO, bold: negrita })] })]
  });
}

function tabla(filas: string[][], encabezado?: string[]) {
  const rows = [
    ...(encabezado ? [new TableRow({ children: encabezado.map((t) => celda(t, true)), tableHeader: true })] : []),
    ...filas.map((fila) => new TableRow({ children: fila.map((t, i) => celda(t, i === 0 && !encabezado)) }))
  ];
  return new Table({ rows, width: { size: 100, type: WidthType.PERCENTAGE } });
}

function filasCampos(campos: CampoInforme[]): string[][] {
  return campos.map((c) => [c.etiqueta, c.valor]);
}

export async function construirDocumento(informe: InformeEstructurado): Promise<Buffer> {
  const { referencia } = informe;
  const cuerpo: Array<Paragraph | Table> = [
    new Paragraph({
      heading: HeadingLevel.TITLE,
      alignment: AlignmentType.CENTER,
      children: [new TextRun({ text: 'REPORTE DE INCIDENTE DE CIBERSEGURIDAD', bold: true })]
    }),
    new Paragraph({ heading: HeadingLevel.HEADING_1, alignment: AlignmentType.CENTER, text: informe.titulo }),
    tabla([
      ['Tipo de reporte', referencia.tipoReporte],
      ['Identificador interno', referencia.idInterno],
      ['Folio ANCI', referencia.folioAnci],
      ['Fecha de generación', referencia.fechaGeneracion],
      ['Plazo límite', referencia.plazoLimite]
    ])
  ];

  for (const seccion of informe.secciones) {
    cuerpo.push(new Paragraph({ heading: HeadingLevel.HEADING_2, text: seccion.titulo }));
    cuerpo.push(
      seccion.campos.length ? tabla(filasCampos(seccion.campos)) : new Paragraph({ text: 'Sin información registrada.' })
    );
  }

  cuerpo.push(new Paragraph({ heading: HeadingLevel.HEADING_2, text: 'Archivos adjuntos' }));
  if (informe.archivosAdjuntos.length) {
    cuerpo.push(
      tabla(
        informe.archivosAdjuntos.map((a) => [a.numero, a.nombreOriginal, a.ubicacion, a.descripcion, a.subidoEn]),
        ['N°', 'Archivo', 'Ubicación', 'Descripción', 'Fecha']
      )
    );
  } else {
    cuerpo.push(new Paragraph({ text: 'No hay evidencias adjuntas a este informe.' }));
  }

  const doc = new Document({
    creator: 'Agente Digital',
    title: informe.titulo,
    description: `Informe ANCI ${referencia.idInterno}`,
    sections: [{ children: cuerpo }]
  });
  return Packer.toBuffer(doc);
}
