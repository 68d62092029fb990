import React from "react";
import { render } from "ink-testing-library";
import { describe, it, expect } from "vitest";
import { ConfirmModal } from "./ConfirmModal.js";

describe("ConfirmModal", () => {
	const deleteProps = {
		title: "Delete folder?",
		color: "red" as const,
		details: [{ value: "~/work/alpha" }],
		message: "This will permanently delete the folder and all its contents!",
		confirmLabel: "Delete",
	};

	it("should render the title and target", () => {
		const { lastFrame } = render(<ConfirmModal {...deleteProps} />);

		const output = lastFrame();
		expect(output).toContain("Delete folder?");
		expect(output).toContain("~/work/alpha");
	});

	it("should display the warning message", () => {
		const { lastFrame } = render(<ConfirmModal {...deleteProps} />);

		expect(lastFrame()).toContain("permanently delete the folder");
	});

	it("should show yes/no options", () => {
		const { lastFrame } = render(<ConfirmModal {...deleteProps} />);

		const output = lastFrame();
		expect(output).toContain("[y] Delete");
		expect(output).toContain("[n/Esc] Cancel");
	});

	it("should label detail lines", () => {
		const { lastFrame } = render(
			<ConfirmModal
				title="Move to Archive?"
				color="yellow"
				details={[
					{ label: "From:", value: "~/work/alpha" },
					{ label: "To:", value: "~/Dev-Archive/alpha" },
				]}
				message="The folder will be moved to your archive."
				confirmLabel="Archive"
			/>,
		);

		const output = lastFrame();
		expect(output).toContain("From: ~/work/alpha");
		expect(output).toContain("~/Dev-Archive/alpha");
		expect(output).toContain("[y] Archive");
	});
});
