export * from "./config";
export * from "./errors";
export { createRowReader, parseTable } from "./csv/csv-reader";
export { formatTable, writeRows } from "./csv/csv-writer";
export { arrayToRowStream, collectRows, isCommentRow, IterableRowStream, IterableRowStreamOptions, Row, RowSource, RowStream } from "./csv/row-stream";
export { headerIndices, missingColumns, setDifference, unmatchedColumns } from "./projector/columns";
export { BulkProjector, createProjector, ProjectionPlan, ProjectionSettings, selectColumns, StreamingProjector, TableProjector } from "./projector/projector";
export { roundCell, roundRow } from "./projector/rounding";
export { Converter, Csv2LatexConverter, csv2latexArguments, separatorCode } from "./splitter/converter";
export { computeSplits, Split, splitTable, stripExtension } from "./splitter/splits";
export { SplitResult, WideSplitter } from "./splitter/wide-splitter";
