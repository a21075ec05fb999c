import { addCourse, ApiError, getCourse, getCourses, type Course } from "./api";

describe("api client", () => {
  const course: Course = {
    code: "CS101",
    name: "Intro",
    instructor: "A",
    semester: "Fall",
    schedule: "MWF",
    classroom: "101",
    grading: "Letter",
    description: "",
    prerequisites: "",
  };

  let fetchMock: jest.SpyInstance;

  const jsonResponse = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), {
      status,
      headers: { "Content-Type": "application/json" },
    });

  beforeEach(() => {
    fetchMock = jest.spyOn(global, "fetch");
    jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("fetches the catalog", async () => {
    fetchMock.mockResolvedValue(jsonResponse([course]));

    await expect(getCourses()).resolves.toEqual([course]);
    expect(fetchMock).toHaveBeenCalledWith(
      "http://localhost:3001/api/courses",
      expect.objectContaining({ headers: { "Content-Type": "application/json" } })
    );
  });

  it("encodes the course code in the detail URL", async () => {
    fetchMock.mockResolvedValue(jsonResponse(course));

    await getCourse("CS 101/A");

    expect(fetchMock.mock.calls[0][0]).toBe("http://localhost:3001/api/courses/CS%20101%2FA");
  });

  it("throws an ApiError carrying the not-found message", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: "No course found with code 'CS999'." }, 404));

    const error = await getCourse("CS999").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      message: "No course found with code 'CS999'.",
      status: 404,
      missing: [],
    });
  });

  it("posts a new course as JSON", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ message: "Course added successfully!", course }, 201));

    const result = await addCourse(course);

    expect(result).toEqual({ message: "Course added successfully!", course });
    expect(fetchMock).toHaveBeenCalledWith(
      "http://localhost:3001/api/courses",
      expect.objectContaining({ method: "POST", body: JSON.stringify(course) })
    );
  });

  it("exposes the missing fields of a rejected submission", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ error: "All fields are required!", missing: ["name", "grading"] }, 400)
    );

    const error = await addCourse({ ...course, name: "", grading: "" }).catch((err: unknown) => err);

    expect(error).toMatchObject({
      message: "All fields are required!",
      status: 400,
      missing: ["name", "grading"],
    });
  });

  it("reports an unknown error when the error body is not JSON", async () => {
    fetchMock.mockResolvedValue(new Response("Bad Gateway", { status: 502 }));

    await expect(getCourses()).rejects.toThrow("Unknown error");
  });
});
