import { isGeometry, isGeometryKind } from "../is-geometry"

describe("isGeometry", () => {
  it("accepts every GeoJSON geometry kind", () => {
    expect(isGeometry({ type: "Point", coordinates: [1, 2] })).toBe(true)
    expect(isGeometry({ type: "MultiPolygon", coordinates: [] })).toBe(true)
    expect(isGeometry({ type: "GeometryCollection", geometries: [] })).toBe(true)
  })

  it("rejects values that are not geometries", () => {
    expect(isGeometry(null)).toBe(false)
    expect(isGeometry("POINT(1 2)")).toBe(false)
    expect(isGeometry([1, 2])).toBe(false)
    expect(isGeometry({ x: 1, y: 2 })).toBe(false)
    expect(isGeometry({ type: "Feature", geometry: null, properties: {} })).toBe(false)
    expect(isGeometry({ type: "Point" })).toBe(false)
    expect(isGeometry({ type: "GeometryCollection", coordinates: [] })).toBe(false)
  })
})

describe("isGeometryKind", () => {
  it("matches the seven geometry kinds only", () => {
    expect(isGeometryKind("LineString")).toBe(true)
    expect(isGeometryKind("Geometry")).toBe(false)
    expect(isGeometryKind("point")).toBe(false)
  })
})
