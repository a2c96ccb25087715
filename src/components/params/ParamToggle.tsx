import React from "react";
import clsx from "clsx";

interface ParamToggleProps {
    label: string;
    value: boolean;
    onChange: (value: boolean) => void;
}

export const ParamToggle: React.FC<ParamToggleProps> = ({ label, value, onChange }) => {
    return (
        <div className="flex items-center justify-between w-full">
            <span className="text-xs uppercase tracking-wider text-neutral-400">{label}</span>
            <button
                type="button"
                role="switch"
                aria-checked={value}
                aria-label={label}
                onClick={() => onChange(!value)}
                className={clsx(
                    "relative w-12 h-6 rounded-full transition-colors",
                    value ? "bg-pink-600" : "bg-neutral-700"
                )}
            >
                <span
                    className={clsx(
                        "absolute top-0.5 left-0.5 w-5 h-5 bg-white rounded-full transition-transform",
                        value ? "translate-x-6" : "translate-x-0"
                    )}
                />
            </button>
        </div>
    );
};
