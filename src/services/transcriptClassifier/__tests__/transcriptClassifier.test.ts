import { describe, expect, it } from "vitest";
import { classifyTranscript, classifyTranscriptDetailed } from "..";
import { extractCalleeSpeech, splitSentences } from "../text";
import { findDecisionMatches, pickDecision } from "../rules/decision";
import { CallOutcome } from "../../../types/campaign";

describe("classifyTranscript", () => {
  describe("empty transcripts", () => {
    it.each(["", "   ", "\n\t "])("treats %j as busy/voicemail", (transcript) => {
      expect(classifyTranscript(transcript)).toBe(CallOutcome.BUSY_VOICEMAIL);
      expect(classifyTranscriptDetailed(transcript).rule).toBe("empty");
    });
  });

  describe("wrong number", () => {
    it.each([
      "Yes, I'll be there. Actually you have the wrong number.",
      "Sorry, there is no one by that name here. Confirmed.",
      "You must have the wrong person, but sure, see you then.",
    ])("wins over any decision keyword: %s", (transcript) => {
      expect(classifyTranscript(transcript)).toBe(CallOutcome.WRONG_NUMBER);
    });
  });

  describe("not available", () => {
    it("detects someone answering for the patient", () => {
      expect(
        classifyTranscript("She's not here right now, can you call back later?")
      ).toBe(CallOutcome.NOT_AVAILABLE);
    });

    it("is checked before decision keywords", () => {
      expect(classifyTranscript("This is a bad time. I'll be there though.")).toBe(
        CallOutcome.NOT_AVAILABLE
      );
      expect(classifyTranscript("He's not home. He will confirm later.")).toBe(
        CallOutcome.NOT_AVAILABLE
      );
    });
  });

  describe("decisions", () => {
    it("confirms a plain acceptance", () => {
      expect(classifyTranscript("Yes, I'll be there, see you then.")).toBe(
        CallOutcome.CONFIRMED
      );
    });

    it("lets a later cancellation override an earlier confirmation", () => {
      expect(
        classifyTranscript("Yes, I'll be there. Hmm, actually I need to cancel.")
      ).toBe(CallOutcome.CANCELLED);
      expect(
        classifyTranscript("I'll be there. Wait, I can't make it after all!")
      ).toBe(CallOutcome.CANCELLED);
    });

    it("lets a later confirmation override an earlier reschedule request", () => {
      expect(
        classifyTranscript(
          "Actually, can we reschedule to next week? ... Yes I confirm the original time."
        )
      ).toBe(CallOutcome.CONFIRMED);
    });

    it("prefers reschedule over cancellation inside one sentence", () => {
      const result = classifyTranscriptDetailed(
        "I can't make it that day, can we do a different time?"
      );
      expect(result.outcome).toBe(CallOutcome.RESCHEDULED);
      expect(result.rule).toBe("decision");
    });

    it("ignores a confirmation phrase that is negated", () => {
      const result = classifyTranscriptDetailed("I cannot confirm that appointment.");
      expect(result.outcome).toBe(CallOutcome.BUSY_VOICEMAIL);
      expect(result.rule).toBe("default");
    });
  });

  describe("voicemail", () => {
    it("detects an answering machine greeting", () => {
      const result = classifyTranscriptDetailed(
        "Hi, you've reached Bob. Please leave a message after the beep."
      );
      expect(result.outcome).toBe(CallOutcome.BUSY_VOICEMAIL);
      expect(result.rule).toBe("voicemail");
    });
  });

  describe("sentiment fallback", () => {
    it("confirms a friendly conversation with no decision keyword", () => {
      const result = classifyTranscriptDetailed(
        "Hello? Oh yes, okay, great, thank you so much for letting me know."
      );
      expect(result.outcome).toBe(CallOutcome.CONFIRMED);
      expect(result.rule).toBe("sentiment");
      expect(result.reason).toBe("positive=4 negative=0");
    });

    it("does not confirm a negative conversation", () => {
      const result = classifyTranscriptDetailed(
        "Hello? Sorry, who is this? No, I don't really know, sorry about that."
      );
      expect(result.outcome).toBe(CallOutcome.BUSY_VOICEMAIL);
      expect(result.rule).toBe("sentiment");
      expect(result.reason).toBe("positive=0 negative=4");
    });

    it("does not confirm on a tie", () => {
      const result = classifyTranscriptDetailed(
        "Hello there, who is this calling me today? Okay then. No."
      );
      expect(result.outcome).toBe(CallOutcome.BUSY_VOICEMAIL);
      expect(result.reason).toBe("positive=1 negative=1");
    });

    it("skips short exchanges", () => {
      expect(classifyTranscriptDetailed("Hello? Okay.").rule).toBe("default");
    });
  });

  describe("speaker-labelled transcripts", () => {
    it("only reads what the callee said", () => {
      const transcript =
        "user: Yes I'll be there.\nassistant: Great, if you need to reschedule just call us back.";
      expect(classifyTranscript(transcript)).toBe(CallOutcome.CONFIRMED);
    });

    it("treats an agent-only monologue as no answer", () => {
      const result = classifyTranscriptDetailed(
        "assistant: Hello? Hello, is anyone there?"
      );
      expect(result.outcome).toBe(CallOutcome.BUSY_VOICEMAIL);
      expect(result.rule).toBe("default");
    });
  });
});

describe("transcript helpers", () => {
  it("extracts callee turns in order", () => {
    expect(
      extractCalleeSpeech("assistant: Hi there.\nuser: Hello?\nassistant: Reminder.\nuser: Thanks.")
    ).toBe("Hello?\nThanks.");
  });

  it("returns unlabelled text unchanged", () => {
    expect(extractCalleeSpeech("Yes I'll be there")).toBe("Yes I'll be there");
  });

  it("splits on punctuation and drops empty sentences", () => {
    expect(splitSentences("one. ... two? three!\nfour")).toEqual([
      "one",
      "two",
      "three",
      "four",
    ]);
  });

  it("records every decision match with its sentence index", () => {
    const matches = findDecisionMatches([
      "i'll be there",
      "actually i need to cancel",
      "or maybe reschedule",
    ]);
    expect(matches.map((m) => [m.family, m.sentenceIndex])).toEqual([
      ["confirmation", 0],
      ["cancellation", 1],
      ["reschedule", 2],
    ]);
    expect(pickDecision(matches)?.family).toBe("reschedule");
  });
});
