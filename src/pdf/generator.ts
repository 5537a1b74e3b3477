// src/pdf/generator.ts
import { jsPDF } from "jspdf";
import autoTable from "jspdf-autotable";
import { THEMES } from "../config.ts";
import { log } from "../utils/misc.ts";
import type { RenderRequest, RenderedSchedule, ScheduleRenderer } from "../types.ts";

const FONT_FILE = "ScheduleFont-Regular.ttf";
const FONT_NAME = "ScheduleFont";
const FALLBACK_FONT = "helvetica";
const HEAD = [["Пара", "Предмет", "Аудитория"]];

export type FontLoader = () => Promise<ArrayBuffer | null>;

function sheetFilename({ entity, date }: RenderRequest): string {
  return `${entity.key.replace(/\s+/g, "_")}_${date.key}.pdf`;
}

/**
 * Draws one entity's day as a themed single-page PDF table.
 */
export class PdfScheduleRenderer implements ScheduleRenderer {
  private warnedAboutFont = false;

  constructor(private readonly loadFont: FontLoader) {}

  async render(request: RenderRequest): Promise<RenderedSchedule> {
    const { entity, date, table, theme } = request;
    const palette = THEMES[theme];
    const doc = new jsPDF({ orientation: "portrait", format: "a5" });
    const font = await this.applyFont(doc);

    const pageWidth = doc.internal.pageSize.getWidth();
    const pageHeight = doc.internal.pageSize.getHeight();

    // --- Background & header ---
    doc.setFillColor(palette.pageFill);
    doc.rect(0, 0, pageWidth, pageHeight, "F");
    doc.setTextColor(palette.titleText);
    doc.setFontSize(16);
    doc.text(entity.key, pageWidth / 2, 15, { align: "center" });
    doc.setFontSize(11);
    doc.text(`${date.weekdayName}, ${date}`, pageWidth / 2, 23, { align: "center" });

    // --- Table ---
    autoTable(doc, {
      head: HEAD,
      body: table.map(entry => [entry.slot, entry.subject, entry.room]),
      startY: 30,
      theme: "grid",
      styles: {
        font,
        fontSize: 9,
        cellPadding: 2,
        valign: "middle",
        overflow: "linebreak",
        fillColor: palette.bodyFill,
        textColor: palette.bodyText,
        lineColor: palette.lineColor,
        lineWidth: 0.2,
      },
      headStyles: {
        fillColor: palette.headerFill,
        textColor: palette.headerText,
        fontSize: 10,
        fontStyle: "normal",
        halign: "center",
      },
      columnStyles: {
        0: { halign: "center", cellWidth: 18 },
        2: { halign: "center", cellWidth: 28 },
      },
    });

    return {
      bytes: new Uint8Array(doc.output("arraybuffer")),
      mimeType: "application/pdf",
      filename: sheetFilename(request),
    };
  }

  private async applyFont(doc: jsPDF): Promise<string> {
    const buffer = await this.loadFont();
    if (!buffer) {
      if (!this.warnedAboutFont) {
        log("WARN", "[PDF] Schedule font unavailable, rendering with the built-in font");
        this.warnedAboutFont = true;
      }
      doc.setFont(FALLBACK_FONT);
      return FALLBACK_FONT;
    }
    doc.addFileToVFS(FONT_FILE, Buffer.from(buffer).toString("base64"));
    doc.addFont(FONT_FILE, FONT_NAME, "normal");
    doc.setFont(FONT_NAME);
    return FONT_NAME;
  }
}
