import fs from "fs";
import { TutorStore } from "./tutorStore";

// Mock fs module
jest.mock("fs");

const mockFs = jest.mocked(fs);

describe("TutorStore", () => {
  const FILE = "/tmp/tutors.json";

  const tutorData = (overrides: Record<string, unknown> = {}) => ({
    name: "Professor Schmidt",
    voiceName: "Professor Schmidt",
    gender: "M",
    teachingStyle: "structured",
    characteristics: ["patient"],
    systemPrompt: "You are Professor Schmidt.",
    nativeLanguage: "German",
    languageCode: "de",
    ...overrides,
  });

  const givenFile = (entries: unknown[]) => {
    mockFs.existsSync.mockReturnValue(true);
    mockFs.readFileSync.mockReturnValue(JSON.stringify(entries));
  };

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, "warn").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("loads tutors and makes the first one current", () => {
    givenFile([tutorData(), tutorData({ name: "Madame Dubois", voiceName: "Madame Dubois", languageCode: "fr" })]);

    const store = new TutorStore(FILE);

    expect(mockFs.readFileSync).toHaveBeenCalledWith(FILE, "utf-8");
    expect(store.list().map((tutor) => tutor.name)).toEqual(["Professor Schmidt", "Madame Dubois"]);
    expect(store.getCurrent().name).toBe("Professor Schmidt");
    expect(store.getCurrent().context).toEqual([]);
  });

  it("skips duplicate voice names", () => {
    givenFile([tutorData(), tutorData({ teachingStyle: "different" })]);

    const store = new TutorStore(FILE);

    expect(store.list()).toHaveLength(1);
    expect(store.list()[0].teachingStyle).toBe("structured");
    expect(console.warn).toHaveBeenCalledWith("Tutor already exists, skipping: Professor Schmidt");
  });

  it("falls back to a default tutor when the file is missing", () => {
    mockFs.existsSync.mockReturnValue(false);

    const store = new TutorStore(FILE);

    expect(store.list()).toHaveLength(1);
    expect(store.getCurrent().name).toBe("Tutor");
    expect(store.getCurrent().languageCode).toBe("en");
  });

  it("falls back when a tutor has an invalid language code", () => {
    givenFile([tutorData({ languageCode: "xx" })]);

    const store = new TutorStore(FILE);

    expect(store.getCurrent().name).toBe("Tutor");
    expect(console.error).toHaveBeenCalledWith("Failed to load tutors:", expect.any(Error));
  });

  it("switches the current tutor by voice name", () => {
    givenFile([tutorData(), tutorData({ name: "Madame Dubois", voiceName: "Madame Dubois", languageCode: "fr" })]);
    const store = new TutorStore(FILE);

    expect(store.setCurrent("Madame Dubois")?.languageCode).toBe("fr");
    expect(store.getCurrent().name).toBe("Madame Dubois");

    expect(store.setCurrent("Nobody")).toBeNull();
    expect(store.getCurrent().name).toBe("Madame Dubois");
    expect(console.error).toHaveBeenCalledWith("Tutor not found: Nobody");
  });

  it("finds a tutor for a language", () => {
    givenFile([tutorData(), tutorData({ name: "Madame Dubois", voiceName: "Madame Dubois", languageCode: "fr" })]);
    const store = new TutorStore(FILE);

    expect(store.findForLanguage("fr")?.name).toBe("Madame Dubois");
    expect(store.findForLanguage("ja")).toBeNull();
  });
});
