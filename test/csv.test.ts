import assert from "assert"
import { promises as fs } from "fs"
import os from "os"
import path from "path"
import {
  CsvReader,
  IOFailureError,
  SourceNotFoundError,
  Table,
  formatCsv,
  loadData,
  parseCsv,
  saveData,
} from "../src/index.js"

const sampleTable = () =>
  new Table(
    ["id", "name", "score"],
    [
      { id: 1, name: "Alice", score: 85.5 },
      { id: 2, name: "Bob", score: 90 },
      { id: 3, name: "Charlie", score: 92.5 },
    ],
  )

describe("csv", () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "tabular-io-csv-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  describe("save", () => {
    it("should write a header line and no row index by default", async () => {
      const file = path.join(dir, "output.csv")
      await saveData(sampleTable(), file, "csv")

      const text = await fs.readFile(file, "utf8")
      assert.strictEqual(text, "id,name,score\n1,Alice,85.5\n2,Bob,90\n3,Charlie,92.5")
    })

    it("should create missing parent directories", async () => {
      const file = path.join(dir, "deep", "nested", "folder", "data.csv")
      await saveData(sampleTable(), file, "csv")

      const stat = await fs.stat(file)
      assert.ok(stat.isFile())
    })

    it("should overwrite an existing file in an existing directory", async () => {
      const file = path.join(dir, "deep", "data.csv")
      await saveData(sampleTable(), file, "csv")
      await saveData(new Table(["only"], [{ only: "x" }]), file, "csv")

      assert.strictEqual(await fs.readFile(file, "utf8"), "only\nx")
    })

    it("should write a row index when asked to", async () => {
      const file = path.join(dir, "indexed.csv")
      const table = new Table(["name"], [{ name: "a" }, { name: "b" }])

      await saveData(table, file, "csv", { writeIndex: true })
      assert.strictEqual(await fs.readFile(file, "utf8"), ",name\n0,a\n1,b")

      await saveData(table, file, "csv", { writeIndex: true, indexLabel: "idx" })
      assert.strictEqual(await fs.readFile(file, "utf8"), "idx,name\n0,a\n1,b")
    })

    it("should honour a custom separator", async () => {
      const file = path.join(dir, "semi.csv")
      const table = new Table(["a", "b"], [{ a: 1, b: "x" }])

      await saveData(table, file, "csv", { separator: ";" })
      assert.strictEqual(await fs.readFile(file, "utf8"), "a;b\n1;x")

      const loaded = await loadData(file, "csv", { separator: ";" })
      assert.ok(loaded.equals(table))
    })

    it("should fail with IOFailureError when the target is a directory", async () => {
      await assert.rejects(saveData(sampleTable(), dir, "csv"), (e: unknown) => {
        assert.ok(e instanceof IOFailureError)
        assert.strictEqual(e.target, dir)
        assert.strictEqual(e.operation, "write")
        assert.ok(e.message.startsWith(`Failed to write CSV to '${dir}': `))
        return true
      })
    })
  })

  describe("load", () => {
    it("should read back exactly what was written", async () => {
      const file = path.join(dir, "roundtrip.csv")
      const table = sampleTable()

      await saveData(table, file, "csv")
      const loaded = await loadData(file, "csv")

      assert.deepStrictEqual(loaded.columns, ["id", "name", "score"])
      assert.strictEqual(loaded.rowCount, 3)
      assert.ok(loaded.equals(table))
    })

    it("should read empty fields as null", async () => {
      const file = path.join(dir, "nulls.csv")
      const table = new Table(["a", "b"], [{ a: "x", b: null }])

      await saveData(table, file, "csv")
      assert.strictEqual(await fs.readFile(file, "utf8"), "a,b\nx,")

      const loaded = await loadData(file, "csv")
      assert.deepStrictEqual(loaded.rows, [{ a: "x", b: null }])
    })

    it("should keep empty cells of a single-column table as rows", async () => {
      const file = path.join(dir, "single.csv")
      const table = new Table(["a"], [{ a: "x" }, { a: null }, { a: "y" }, { a: null }])

      await saveData(table, file, "csv")
      assert.strictEqual(await fs.readFile(file, "utf8"), 'a\nx\n""\ny\n""')

      const loaded = await loadData(file, "csv")
      assert.strictEqual(loaded.rowCount, 4)
      assert.ok(loaded.equals(table))
    })

    it("should read empty strings back as null", async () => {
      const file = path.join(dir, "empty-string.csv")

      await saveData(new Table(["a", "b"], [{ a: "", b: "x" }]), file, "csv")
      assert.strictEqual(await fs.readFile(file, "utf8"), "a,b\n,x")

      const loaded = await loadData(file, "csv")
      assert.deepStrictEqual(loaded.rows, [{ a: null, b: "x" }])
    })

    it("should ignore only the line break at the end of the file", async () => {
      const file = path.join(dir, "blank-lines.csv")
      await fs.writeFile(file, "a,b\n1,2\n\n3,4\n")

      const loaded = await loadData(file, "csv")
      assert.deepStrictEqual(loaded.rows, [
        { a: 1, b: 2 },
        { a: null, b: null },
        { a: 3, b: 4 },
      ])
    })

    it("should wrap lookup failures other than a missing file", async () => {
      const file = path.join(dir, `${"x".repeat(300)}.csv`)

      await assert.rejects(loadData(file, "csv"), (e: unknown) => {
        assert.ok(e instanceof IOFailureError)
        assert.strictEqual(e.operation, "read")
        assert.strictEqual(e.target, file)
        assert.ok("code" in e.cause && e.cause.code === "ENAMETOOLONG")
        return true
      })
    })

    it("should throw SourceNotFoundError if the file is not found", async () => {
      await assert.rejects(loadData("non_existent_ghost_file.csv", "csv"), {
        name: "SourceNotFoundError",
        message: "The file 'non_existent_ghost_file.csv' does not exist.",
      })
    })

    it("should report the missing path on the error", async () => {
      const missing = path.join(dir, "missing.csv")
      await assert.rejects(new CsvReader().read(missing), (e: unknown) => {
        assert.ok(e instanceof SourceNotFoundError)
        assert.strictEqual(e.path, missing)
        return true
      })
    })

    it("should wrap parse failures in IOFailureError with the cause attached", async () => {
      const file = path.join(dir, "invalid.csv")
      await fs.writeFile(file, 'a,b\n1,"unterminated')

      await assert.rejects(loadData(file, "csv"), (e: unknown) => {
        assert.ok(e instanceof IOFailureError)
        assert.strictEqual(e.name, "IOFailureError")
        assert.strictEqual(e.format, "CSV")
        assert.strictEqual(e.target, file)
        assert.ok(e.cause instanceof Error)
        assert.strictEqual(e.message, `Failed to read CSV from '${file}': ${e.cause.message}`)
        return true
      })
    })

    it("should return an empty table for an empty file", async () => {
      const file = path.join(dir, "empty.csv")
      await fs.writeFile(file, "")

      const loaded = await loadData(file, "csv")
      assert.strictEqual(loaded.rowCount, 0)
    })
  })

  describe("parseCsv", () => {
    it("should parse quoted fields and escaped quotes", () => {
      const table = parseCsv('id,desc\n1,"Hello, world"\n2,"She said ""Hi"""')
      assert.deepStrictEqual(table.column("desc"), ["Hello, world", 'She said "Hi"'])
      assert.deepStrictEqual(table.column("id"), [1, 2])
    })

    it("should fill missing trailing cells with null", () => {
      const table = parseCsv("col1,col2\nval1\nval2,valb")
      assert.deepStrictEqual(table.column("col2"), [null, "valb"])
    })

    it("should name columns by position when there is no header", () => {
      const table = parseCsv("1,x\n2,y", { header: false })
      assert.deepStrictEqual(table.columns, ["field0", "field1"])
      assert.deepStrictEqual(table.column("field0"), [1, 2])
      assert.deepStrictEqual(table.column("field1"), ["x", "y"])
    })

    it("should type booleans and numbers", () => {
      const table = parseCsv("flag,n\ntrue,-1.5")
      assert.deepStrictEqual(table.rows, [{ flag: true, n: -1.5 }])
    })
  })

  describe("formatCsv", () => {
    it("should quote values containing the separator or quotes", () => {
      const table = new Table(["desc"], [{ desc: "a, b" }, { desc: 'say "hi"' }])
      assert.strictEqual(formatCsv(table), 'desc\n"a, b"\n"say ""hi"""')
    })

    it("should write only the header line for a table without rows", () => {
      const table = new Table(["a", "b"])
      assert.strictEqual(formatCsv(table), "a,b")

      const parsed = parseCsv(formatCsv(table))
      assert.deepStrictEqual(parsed.columns, ["a", "b"])
      assert.strictEqual(parsed.rowCount, 0)
    })

    it("should leave out the header line when disabled", () => {
      const table = new Table(["a", "b"], [{ a: 1, b: 2 }])
      assert.strictEqual(formatCsv(table, { header: false }), "1,2")
    })
  })
})
