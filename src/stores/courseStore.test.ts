import fs from "fs";
import { CourseStore, CatalogParseError } from "./courseStore";
import { Course } from "../domain/course";

// Mock fs module
jest.mock("fs");

const mockFs = jest.mocked(fs);

describe("CourseStore", () => {
  const FILE_PATH = "/srv/catalog/course_catalog.json";

  // In-memory stand-in for the disk
  let files: Map<string, string>;

  const createCourse = (overrides: Partial<Course> = {}): Course => ({
    code: "CS101",
    name: "Intro",
    instructor: "A",
    semester: "Fall",
    schedule: "MWF",
    classroom: "101",
    grading: "Letter",
    description: "",
    prerequisites: "",
    ...overrides,
  });

  beforeEach(() => {
    jest.clearAllMocks();
    files = new Map();
    mockFs.existsSync.mockImplementation((p) => files.has(String(p)));
    mockFs.readFileSync.mockImplementation((p) => {
      const content = files.get(String(p));
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${String(p)}'`);
      }
      return content;
    });
    mockFs.writeFileSync.mockImplementation((p, data) => {
      files.set(String(p), String(data));
    });
  });

  describe("load", () => {
    it("returns an empty catalog when the backing file does not exist", () => {
      const store = new CourseStore(FILE_PATH);

      expect(store.load()).toEqual([]);
      expect(mockFs.readFileSync).not.toHaveBeenCalled();
    });

    it("returns courses in file order", () => {
      files.set(FILE_PATH, JSON.stringify([createCourse({ code: "B" }), createCourse({ code: "A" })]));
      const store = new CourseStore(FILE_PATH);

      expect(store.load().map(c => c.code)).toEqual(["B", "A"]);
      expect(mockFs.readFileSync).toHaveBeenCalledWith(FILE_PATH, "utf-8");
    });

    it("throws CatalogParseError on malformed JSON", () => {
      files.set(FILE_PATH, "[{\"code\": ");
      const store = new CourseStore(FILE_PATH);

      expect(() => store.load()).toThrow(CatalogParseError);
    });

    it("throws CatalogParseError when the file is not a JSON array", () => {
      files.set(FILE_PATH, JSON.stringify({ code: "CS101" }));
      const store = new CourseStore(FILE_PATH);

      expect(() => store.load()).toThrow(
        `Cannot read course catalog at ${FILE_PATH}: expected a JSON array`
      );
    });

    it("throws CatalogParseError when an entry is not an object", () => {
      files.set(FILE_PATH, JSON.stringify([createCourse(), null]));
      const store = new CourseStore(FILE_PATH);

      expect(() => store.load()).toThrow(
        `Cannot read course catalog at ${FILE_PATH}: entry 1 is not a course object`
      );
      expect(() => store.findByCode("X")).toThrow(CatalogParseError);
    });

    it("propagates read errors", () => {
      mockFs.existsSync.mockReturnValue(true);
      mockFs.readFileSync.mockImplementation(() => {
        throw new Error("EACCES: permission denied");
      });
      const store = new CourseStore(FILE_PATH);

      expect(() => store.load()).toThrow("EACCES: permission denied");
    });
  });

  describe("append", () => {
    it("creates the backing file and its directory on first append", () => {
      const store = new CourseStore(FILE_PATH);
      const course = createCourse();

      store.append(course);

      expect(mockFs.mkdirSync).toHaveBeenCalledWith("/srv/catalog", { recursive: true });
      expect(mockFs.writeFileSync).toHaveBeenCalledWith(
        FILE_PATH,
        JSON.stringify([course], null, 4),
        "utf-8"
      );
    });

    it("keeps serial appends in call order", () => {
      const store = new CourseStore(FILE_PATH);
      const courses = ["CS101", "CS102", "MA201", "PH110"].map(code => createCourse({ code }));

      for (const course of courses) {
        store.append(course);
      }

      expect(store.load()).toEqual(courses);
    });

    it("places the appended record last, deep-equal to the input", () => {
      files.set(FILE_PATH, JSON.stringify([createCourse({ code: "OLD1" })]));
      const store = new CourseStore(FILE_PATH);
      const course = createCourse({ code: "NEW1", description: "Line one\nLine two" });

      store.append(course);
      const loaded = store.load();

      expect(loaded).toHaveLength(2);
      expect(loaded[loaded.length - 1]).toEqual(course);
    });

    it("does not write when the existing file is malformed", () => {
      files.set(FILE_PATH, "not json");
      const store = new CourseStore(FILE_PATH);

      expect(() => store.append(createCourse())).toThrow(CatalogParseError);
      expect(mockFs.writeFileSync).not.toHaveBeenCalled();
    });

    it("propagates write errors", () => {
      mockFs.writeFileSync.mockImplementation(() => {
        throw new Error("ENOSPC: no space left on device");
      });
      const store = new CourseStore(FILE_PATH);

      expect(() => store.append(createCourse())).toThrow("ENOSPC: no space left on device");
    });
  });

  describe("findByCode", () => {
    it("returns the first match when codes repeat", () => {
      const store = new CourseStore(FILE_PATH);
      store.append(createCourse({ code: "CS101", name: "First" }));
      store.append(createCourse({ code: "CS101", name: "Second" }));

      expect(store.findByCode("CS101")?.name).toBe("First");
    });

    it("returns null when no course has the code", () => {
      const store = new CourseStore(FILE_PATH);
      store.append(createCourse());

      expect(store.findByCode("CS999")).toBeNull();
    });
  });

  it("supports the CS101 scenario end to end", () => {
    const store = new CourseStore(FILE_PATH);
    const course = createCourse();

    store.append(course);

    expect(store.load()).toEqual([course]);
    expect(store.load().filter(c => c.code === "CS101")).toEqual([course]);
    expect(store.findByCode("CS999")).toBeNull();
  });
});
