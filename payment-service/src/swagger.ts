import openApiDocument from "./openapi.json";

export { openApiDocument };
