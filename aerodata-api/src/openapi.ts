// src/openapi.ts
const reconcileFlags = {
  search_radius: { type: "number", default: 5000, description: "Radius in meters to look for a directory airport" },
  update_radius: { type: "number", default: 2000, description: "Matches up to this distance (meters) are applied; must not exceed search_radius" },
  update_locations: { type: "boolean", default: true, description: "Overwrite lat/lon with the directory position" },
  delete_closed: { type: "boolean", default: false, description: "Remove airports the directory reports as closed" },
  add_new: { type: "boolean", default: false, description: "Append directory airports found inside the file's area" },
};

const errorResponse = {
  description: "Error",
  content: { "application/json": { schema: { $ref: "#/components/schemas/Error" } } },
};

const openapiDocument = {
  openapi: "3.0.3",
  info: {
    title: "aerodata API",
    version: "1.0.0",
    description: "CUP waypoint files: inspection and airport reconciliation against the airport directory.",
  },
  servers: [{ url: "http://localhost:8081" }],
  tags: [{ name: "Health" }, { name: "CUP" }],
  paths: {
    "/v1/health": {
      get: {
        tags: ["Health"],
        summary: "Service health",
        responses: {
          "200": {
            description: "OK",
            content: {
              "application/json": {
                schema: {
                  type: "object",
                  properties: { ok: { type: "boolean" }, directory: { type: "boolean", description: "Directory configured" } },
                },
              },
            },
          },
        },
      },
    },

    "/v1/cup/update": {
      post: {
        tags: ["CUP"],
        summary: "Update the airports of a CUP file from the directory",
        requestBody: {
          required: true,
          content: {
            "multipart/form-data": {
              schema: {
                type: "object",
                required: ["file"],
                properties: { file: { type: "string", format: "binary" }, ...reconcileFlags },
              },
            },
          },
        },
        responses: {
          "200": {
            description: "Updated file and report",
            content: { "application/json": { schema: { $ref: "#/components/schemas/UpdateResult" } } },
          },
          "400": errorResponse,
          "422": errorResponse,
          "502": errorResponse,
          "503": errorResponse,
        },
      },
    },

    "/v1/cup/inspect": {
      post: {
        tags: ["CUP"],
        summary: "Parse a CUP file and list its waypoints",
        requestBody: {
          required: true,
          content: {
            "multipart/form-data": {
              schema: { type: "object", required: ["file"], properties: { file: { type: "string", format: "binary" } } },
            },
          },
        },
        responses: {
          "200": {
            description: "Parsed file",
            content: { "application/json": { schema: { $ref: "#/components/schemas/InspectResult" } } },
          },
          "400": errorResponse,
          "422": errorResponse,
        },
      },
    },
  },
  components: {
    schemas: {
      Error: {
        type: "object",
        properties: {
          ok: { type: "boolean", example: false },
          error: { type: "string", example: "codec_error" },
          message: { type: "string" },
        },
      },
      Counts: {
        type: "object",
        properties: {
          totalWaypointsBefore: { type: "integer" },
          totalAirportsBefore: { type: "integer" },
          totalWaypointsAfter: { type: "integer" },
          totalAirportsAfter: { type: "integer" },
          updated: { type: "integer" },
          added: { type: "integer" },
          deleted: { type: "integer" },
          notFound: { type: "integer" },
          notUpdated: { type: "integer" },
          distanceBuckets: {
            type: "object",
            additionalProperties: { type: "integer" },
            example: { distance_lte_500m: 3, distance_lte_1000m: 1 },
          },
        },
      },
      UpdateResult: {
        type: "object",
        properties: {
          ok: { type: "boolean", example: true },
          file_name: { type: "string", example: "alps-updated.cup" },
          cup: { type: "string", description: "Updated CUP file content" },
          report: { type: "string" },
          counts: { $ref: "#/components/schemas/Counts" },
        },
      },
      Waypoint: {
        type: "object",
        properties: {
          id: { type: "string", format: "uuid" },
          name: { type: "string" },
          code: { type: "string", nullable: true },
          country: { type: "string", nullable: true },
          lat: { type: "number" },
          lon: { type: "number" },
          elev: { type: "string", nullable: true, example: "504.5m" },
          style: { type: "integer", nullable: true },
          rwdir: { type: "integer", nullable: true },
          rwlen: { type: "string", nullable: true },
          rwwidth: { type: "string", nullable: true },
          freq: { type: "string", nullable: true },
          desc: { type: "string", nullable: true },
          userdata: { type: "string", nullable: true },
          pics: { type: "string", nullable: true },
        },
      },
      InspectResult: {
        type: "object",
        properties: {
          ok: { type: "boolean" },
          file_name: { type: "string" },
          counts: {
            type: "object",
            properties: {
              waypoints: { type: "integer" },
              landables: { type: "integer" },
              airports: { type: "integer" },
              outlandings: { type: "integer" },
              task_lines: { type: "integer" },
            },
          },
          bounding_box: {
            type: "object",
            nullable: true,
            properties: {
              minLat: { type: "number" },
              minLon: { type: "number" },
              maxLat: { type: "number" },
              maxLon: { type: "number" },
            },
          },
          waypoints: { type: "array", items: { $ref: "#/components/schemas/Waypoint" } },
        },
      },
    },
  },
};

export default openapiDocument;
