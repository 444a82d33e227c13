// The package entry runs a self-test when it has no CommonJS parent (as under
// an ESM import); the library module itself is loaded instead, typed by @types/pdf-parse.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdfParse = require("pdf-parse");
  export = pdfParse;
}
