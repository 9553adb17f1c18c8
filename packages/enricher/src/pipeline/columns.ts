import { padRecord } from "@anime-csv/core";
import { IMAGE_COLUMN } from "../resume";

export interface OutputLayout {
  header: string[];
  /** Position of the image column in the output header. */
  imageIndex: number;
  /** True when the input already carried an image column that is reused in place. */
  inPlace: boolean;
}

export function planOutputColumns(header: string[], idColumn: string): OutputLayout {
  const existing = header.indexOf(IMAGE_COLUMN);
  if (existing >= 0) {
    return { header: [...header], imageIndex: existing, inPlace: true };
  }

  const idIndex = header.indexOf(idColumn);
  const imageIndex = idIndex < 0 ? 0 : idIndex + 1;
  return {
    header: [...header.slice(0, imageIndex), IMAGE_COLUMN, ...header.slice(imageIndex)],
    imageIndex,
    inPlace: false,
  };
}

export function placeImage(record: string[], width: number, layout: OutputLayout, image: string): string[] {
  const cells = padRecord(record, width);
  if (layout.inPlace) {
    cells[layout.imageIndex] = image;
    return cells;
  }
  return [...cells.slice(0, layout.imageIndex), image, ...cells.slice(layout.imageIndex)];
}
